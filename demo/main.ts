// demo/main.ts
import { createDefaultMaskRequest, exportMask, measureMaskCoverage, buildMaskProgram, setLogLevel } from "../src";

setLogLevel("info");

const request = createDefaultMaskRequest();

try {
  const { lineCount, outputPath } = await exportMask(request);
  const coverage = measureMaskCoverage(buildMaskProgram(request), request.ellipse, request.frame);

  console.log(
    `Wrote ${lineCount} commands to ${outputPath}, dark area covered: ${(
      coverage.darkCoveredFraction * 100
    ).toFixed(1)}%`
  );
} catch (err) {
  console.error(err);
  process.exitCode = 1;
}
