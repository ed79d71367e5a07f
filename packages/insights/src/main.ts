import path from "node:path";
import { TIDY_FILE } from "crowding-pipeline";
import { SORT_MODES, TIME_WINDOWS, type TidyTable } from "crowding-shared/types";
import yargs, { type Argv } from "yargs";
import { hideBin } from "yargs/helpers";
import { buildHeatmap } from "./heatmap";
import { summarizeKpis } from "./kpi";
import { TidyTableStore } from "./load";
import { selectionOptions } from "./options";
import { DEFAULT_TOP_N, rankRushWindow } from "./ranking";
import { stationSeries } from "./station-series";
import { RUSH_WINDOWS, windowBounds } from "./windows";

const DATA_PATH = path.join(process.cwd(), "data", TIDY_FILE);
const NO_DATA = "[WARN] No data for this selection";

const fmt = (v: number | null) => (v === null ? "-" : v.toFixed(1));

const withData = <T>(y: Argv<T>) =>
  y.option("data", {
    type: "string",
    default: DATA_PATH,
    describe: "Tidy crowding table produced by the pipeline",
  });

const withSelection = <T>(y: Argv<T>) =>
  withData(y)
    .option("day", { type: "string", default: "평일", describe: "Day type" })
    .option("line", { type: "string", default: "2호선", describe: "Line" })
    .option("direction", { type: "string", default: "내선", describe: "Direction" });

let store: TidyTableStore | undefined;
function table(csvPath: string): Promise<TidyTable> {
  // one store per process; --data is the same for every command of a run
  store ??= new TidyTableStore(csvPath);
  return store.get();
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("crowding-insights")
    .command(
      "heatmap",
      "Station x time pivot of mean crowding",
      (y) =>
        withSelection(y).option("sort", {
          choices: SORT_MODES,
          default: "avg_desc" as const,
          describe: "Station order",
        }),
      async (argv) => {
        const heatmap = buildHeatmap(await table(argv.data), {
          dayType: argv.day,
          line: argv.line,
          direction: argv.direction,
          sortMode: argv.sort,
        });
        if (heatmap.stations.length === 0) {
          console.warn(NO_DATA);
          return;
        }
        console.log(["station", ...heatmap.timeLabels].join("\t"));
        heatmap.stations.forEach((station, i) => {
          console.log([station, ...(heatmap.matrix[i] ?? []).map(fmt)].join("\t"));
        });
        if (heatmap.colorRange) {
          console.log(`color range: ${heatmap.colorRange.map((v) => v.toFixed(1)).join(" ~ ")}`);
        }
      },
    )
    .command(
      "ranking",
      "Most crowded stations over a rush window",
      (y) =>
        withData(y)
          .option("day", { type: "string", default: "평일", describe: "Day type" })
          .option("line", { type: "string", describe: "Restrict to one line" })
          .option("direction", { type: "string", describe: "Restrict to one direction" })
          .option("window", {
            choices: TIME_WINDOWS,
            default: "morning" as const,
            describe: "Time window",
          })
          .option("top", { type: "number", default: DEFAULT_TOP_N, describe: "Entries (5-20)" }),
      async (argv) => {
        const entries = rankRushWindow(await table(argv.data), {
          dayType: argv.day,
          line: argv.line,
          direction: argv.direction,
          timeWindow: argv.window,
          topN: argv.top,
        });
        if (entries.length === 0) {
          console.warn(NO_DATA);
          return;
        }
        for (const e of entries) {
          console.log(
            `${e.rank}\t${e.stationName}\t${e.line}\t${e.direction}\t${fmt(e.avgCrowding)}\t${e.peakTimeLabel}`,
          );
        }
      },
    )
    .command(
      "kpi",
      "Headline numbers for a selection",
      (y) => withSelection(y),
      async (argv) => {
        const kpi = summarizeKpis(await table(argv.data), {
          dayType: argv.day,
          line: argv.line,
          direction: argv.direction,
        });
        if (kpi.kind === "empty") {
          console.warn(NO_DATA);
          return;
        }
        console.log(`Mean crowding: ${fmt(kpi.overallMean)}`);
        console.log(`Most crowded station: ${kpi.topStation} (${fmt(kpi.topStationMean)})`);
        console.log(`Peak time: ${kpi.peakTimeLabel} (${fmt(kpi.peakTimeMean)})`);
        console.log(`Stations: ${kpi.stationCount}`);
        console.log(`Morning / evening: ${fmt(kpi.morningMean)} / ${fmt(kpi.eveningMean)}`);
      },
    )
    .command(
      "station <name>",
      "Crowding through the day at one station",
      (y) => withSelection(y).positional("name", { type: "string", demandOption: true }),
      async (argv) => {
        const series = stationSeries(await table(argv.data), {
          dayType: argv.day,
          line: argv.line,
          direction: argv.direction,
          stationName: argv.name,
        });
        if (series.kind === "empty") {
          console.warn(NO_DATA);
          return;
        }
        console.log(series.title);
        console.log(`Mean ${fmt(series.mean)}, max ${fmt(series.max)}`);
        const bands = (["morning", "evening"] as const).map((w) => ({
          name: RUSH_WINDOWS[w].name,
          ...windowBounds(w),
        }));
        for (const p of series.points) {
          // "HH:MM" labels compare correctly as strings
          const band = bands.find((b) => p.timeLabel >= b.from && p.timeLabel <= b.to);
          console.log(`${p.timeLabel}\t${fmt(p.crowding)}${band ? `\t${band.name}` : ""}`);
        }
      },
    )
    .command(
      "options",
      "Values available to each selection widget",
      (y) => withData(y).option("line", { type: "string", describe: "Line for stations/directions" }),
      async (argv) => {
        const opts = selectionOptions(await table(argv.data), argv.line);
        console.log(`Day types: ${opts.dayTypes.join(", ")}`);
        console.log(`Lines: ${opts.lines.join(", ")}`);
        console.log(`Stations (${opts.line ?? "-"}): ${opts.stations.join(", ")}`);
        console.log(`Directions (${opts.line ?? "-"}): ${opts.directions.join(", ")}`);
      },
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

main().catch((e: unknown) => {
  console.error("[FAIL]", e);
  process.exitCode = 1;
});
