// mesh-viewer.ts
// Loads an OBJ file, scales it and renders a few frames into a recording surface.
// Usage: tsx src/examples/mesh-viewer.ts [file.obj] [scale]

import * as path from "path";
import { MeshRenderer } from "../algorithms/mesh-renderer";
import { ScaleMesh } from "../algorithms/scale-mesh";
import { createLogger } from "../config";
import { ProcessingNetwork } from "../processing-network";
import { RenderLoop } from "../render-loop";
import { RecordingSurface } from "../visualization";

async function main() {
  const logger = createLogger({ name: "mesh-viewer" });
  const fileName = process.argv[2] ?? path.join(__dirname, "..", "fixtures", "mesh.obj");
  const factor = Number(process.argv[3] ?? "1");

  const network = new ProcessingNetwork({ logger });
  const scale = new ScaleMesh(factor, { logger });
  const renderer = new MeshRenderer({ logger });

  const read = network.loadFile(fileName, {
    success: (command) => logger.info({ file: command.fileName }, "Mesh loaded"),
    fail: (command, reason) => logger.error({ file: command.fileName, err: reason }, "Mesh not loaded"),
  });
  network.addAlgorithm(scale);
  network.addAlgorithm(renderer);
  network.connectAlgorithms(read.source, "Data", scale, "Triangle Mesh");
  network.connectAlgorithms(scale, "Scaled Mesh", renderer, "Triangle Mesh");
  const run = network.runNetwork();

  network.start();
  await run.wait();

  const surface = new RecordingSurface();
  const loop = new RenderLoop(network, { surface, logger });
  for (let i = 0; i < 3; i++) {
    const view = await loop.renderFrame();
    logger.info(
      { frame: view.frame, size: view.bounds.getSize(), center: view.bounds.getCenter() },
      "Frame rendered"
    );
  }
  logger.info({ calls: surface.calls }, "Draw calls");

  await loop.stop();
  await network.stop(true);
}

main().catch((err) => {
  console.error("Mesh viewer failed:", err);
  process.exit(1);
});
