import { Command } from "commander";
import { log } from "../lib/log";
import { type ClientOpts, formatOutput, parseIntArg, withClient, withClientOptions } from "./shared";

type FetchOpts = ClientOpts & { year: number; month: number };

function count(data: unknown) {
  return Array.isArray(data) ? data.length : 0;
}

const now = new Date();

export const fetchCommand = withClientOptions(
  new Command("fetch")
    .description("Fetch yearly and monthly consumption plus alert settings")
    .option("--year <year>", "Year", parseIntArg, now.getFullYear())
    .option("--month <month>", "Month (1-12)", parseIntArg, now.getMonth() + 1),
).action(async (opts: FetchOpts) => {
  await withClient(opts, async (client) => {
    const s = await client.fetchAllData(opts.year, opts.month);
    log.out(`Monthly consumption entries: ${count(s.monthlyConsumption)}`);
    log.out(`Daily consumption entries: ${count(s.dailyConsumption)}`);
    log.out(formatOutput({ alertSettings: s.alertSettings }, opts.format));
  });
});
