// reader.ts
// File readers produce typed datasets from a path.

import * as path from "path";
import { DataType } from "./data";

export interface Reader<T = unknown> {
  readonly name: string;
  /** Declared type of every dataset this reader returns. */
  readonly produces: DataType<T>;
  canLoad(fileName: string): boolean;
  /** Rejects with a ReaderError describing what went wrong. */
  load(fileName: string): Promise<T>;
}

/** Base for readers that select files by extension. */
export abstract class ExtensionReader<T> implements Reader<T> {
  private readonly extensions: ReadonlySet<string>;

  constructor(
    public readonly name: string,
    public readonly produces: DataType<T>,
    extensions: readonly string[]
  ) {
    this.extensions = new Set(extensions.map((ext) => ext.toLowerCase()));
  }

  canLoad(fileName: string): boolean {
    return this.extensions.has(path.extname(fileName).toLowerCase());
  }

  abstract load(fileName: string): Promise<T>;
}
