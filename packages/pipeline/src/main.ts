import path from "node:path";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { REPORT_FILE, serializeReport, serializeTidy, TIDY_FILE, writeArtifacts } from "./output";
import { runPipeline } from "./pipeline";
import { formatQualityReport } from "./report";

const DATA_DIR = path.join(process.cwd(), "data");

function parseArgs() {
  const argv = yargs(hideBin(process.argv))
    .scriptName("crowding-pipeline")
    .option("input", {
      alias: "i",
      type: "string",
      default: path.join(DATA_DIR, "raw.csv"),
      describe: "Raw crowding export (wide format, one column per time slot)",
    })
    .option("out-dir", {
      alias: "o",
      type: "string",
      default: DATA_DIR,
      describe: "Directory for the tidy table and the quality report",
    })
    .strict()
    .help()
    .parseSync();

  return { input: argv.input, outDir: argv["out-dir"] };
}

function main() {
  const { input, outDir } = parseArgs();
  console.log("[START] Tidy pipeline\n");

  const { tidy, report } = runPipeline(input);
  console.log(`\n${formatQualityReport(report)}\n`);

  // Everything is in memory at this point; only now touch the output directory
  console.log("[*] Saving cleaned data...");
  // the tidy table goes last: it only replaces the old one once its report is in place
  const written = writeArtifacts(outDir, {
    [REPORT_FILE]: serializeReport(report),
    [TIDY_FILE]: serializeTidy(tidy),
  });
  for (const file of written) {
    console.log(`  [OK] Saved: ${file}`);
  }

  if (!report.passed) {
    console.warn("[WARN] Quality criteria not met, see the report above");
  }
  console.log(`\n[COMPLETE] ${tidy.length.toLocaleString("en-US")} rows in ${outDir}`);
}

try {
  main();
} catch (e) {
  console.error("[FAIL] Pipeline aborted:", e);
  process.exitCode = 1;
}
