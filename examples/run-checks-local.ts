// examples/run-checks-local.ts
import { fileURLToPath } from "node:url";

import { CsvFileDatasetProvider, StdoutReportSink, createLogger, runReport } from "../packages/runner/src/index.js";
import { DEFAULT_QA_CONFIG } from "../packages/dataset/src/index.js";

function dataFile(name: string): string {
  return fileURLToPath(new URL(`./data/${name}`, import.meta.url));
}

async function main() {
  const result = await runReport({
    // the live sheet hands back strings; the reference CSV is type-inferred
    newProvider: new CsvFileDatasetProvider(dataFile("new.csv"), { inferTypes: false }),
    existingProvider: new CsvFileDatasetProvider(dataFile("existing.csv"), { inferTypes: true }),
    sink: new StdoutReportSink((s) => process.stdout.write(s)),
    config: DEFAULT_QA_CONFIG,
    logger: createLogger("warn"),
  });

  if (!result.ok) {
    console.error(`[${result.stage}] ${result.error}`);
    process.exitCode = 1;
    return;
  }
  console.error(`${result.anomalies.length} anomalies`);
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
