// strategy-switching.ts
// Two rendering strategies over one mesh; a timer switches between them while
// the render loop keeps drawing.

import * as path from "path";
import { ComputeVertexNormals } from "../algorithms/compute-vertex-normals";
import { DirectionRenderer } from "../algorithms/direction-renderer";
import { MeshRenderer } from "../algorithms/mesh-renderer";
import { createLogger, loadConfig } from "../config";
import { ProcessingNetwork } from "../processing-network";
import { RenderLoop } from "../render-loop";
import { AlgorithmStrategies, AlgorithmStrategy } from "../strategies";
import { RecordingSurface } from "../visualization";

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

async function main() {
  const config = loadConfig();
  const logger = createLogger({ name: "strategy-switching" });

  // Strategies exist before the network does.
  const strategies = new AlgorithmStrategies(null, { logger });
  const surfaceStrategy = new AlgorithmStrategy("surface");
  surfaceStrategy.addAlgorithm(new MeshRenderer({ logger }));

  const normalsStrategy = new AlgorithmStrategy("normals");
  const normals = normalsStrategy.addAlgorithm(new ComputeVertexNormals({ logger }));
  const glyphs = normalsStrategy.addAlgorithm(new DirectionRenderer({ logger }));

  strategies.addStrategy(surfaceStrategy);
  strategies.addStrategy(normalsStrategy);

  const network = new ProcessingNetwork({ name: config.networkName, logger });
  strategies.setNetwork(network);
  network.start();

  const read = network.loadFile(path.join(__dirname, "..", "fixtures", "mesh.obj"));
  strategies.prepareProcessingNetwork();
  strategies.connectToAll(read.source, "Data", "Triangle Mesh");
  network.connectAlgorithms(normals, "Normals", glyphs, "Directions");
  await network.runNetwork().wait();

  const surface = new RecordingSurface();
  const loop = new RenderLoop(network, { surface, logger, frameIntervalMs: config.frameIntervalMs });
  loop.start();

  for (let round = 0; round < 4; round++) {
    const index = round % strategies.getStrategies().length;
    const rerun = strategies.select(index);
    await rerun?.wait();
    surface.reset();
    await sleep(config.frameIntervalMs * 3);
    logger.info(
      {
        strategy: strategies.getCurrent()?.name,
        sources: Array.from(new Set(surface.calls.map((call) => call.source))),
      },
      "Strategy active"
    );
  }

  await loop.stop();
  await network.stop(true);
}

main().catch((err) => {
  console.error("Strategy switching failed:", err);
  process.exit(1);
});
