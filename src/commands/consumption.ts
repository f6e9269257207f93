import { Command } from "commander";
import { log } from "../lib/log";
import { type ClientOpts, formatOutput, parseIntArg, withClient, withClientOptions } from "./shared";

type ConsumptionOpts = ClientOpts & { year: number; month?: number };

const consumption = new Command("consumption")
  .description("Water consumption history")
  .action(function (this: Command) {
    this.outputHelp();
  });

withClientOptions(
  consumption
    .command("yearly")
    .description("Monthly totals for one year")
    .option("--year <year>", "Year", parseIntArg, new Date().getFullYear()),
).action(async (opts: ConsumptionOpts) => {
  await withClient(opts, async (client) => {
    const data = await client.getConsumptionData("yearly", opts.year);
    log.out(formatOutput(data, opts.format));
  });
});

withClientOptions(
  consumption
    .command("monthly")
    .description("Daily values for one month")
    .option("--year <year>", "Year", parseIntArg, new Date().getFullYear())
    .requiredOption("--month <month>", "Month (1-12)", parseIntArg),
).action(async (opts: ConsumptionOpts) => {
  await withClient(opts, async (client) => {
    const data = await client.getConsumptionData("monthly", opts.year, opts.month);
    log.out(formatOutput(data, opts.format));
  });
});

export const consumptionCommand = consumption;
