export * from "./algorithm";
export * from "./command";
export * from "./command-queue";
export * from "./commands";
export * from "./config";
export * from "./connector";
export * from "./data";
export * from "./errors";
export * from "./obj-reader";
export * from "./processing-network";
export * from "./reader";
export * from "./render-loop";
export * from "./strategies";
export * from "./visualization";
export * from "./algorithms/compute-vertex-normals";
export * from "./algorithms/data-inject";
export * from "./algorithms/direction-renderer";
export * from "./algorithms/mesh-renderer";
export * from "./algorithms/scale-mesh";
