import { Command } from "commander";
import { log } from "../lib/log";
import type { AlertSettings } from "../lib/types";
import { type ClientOpts, formatOutput, parseIntArg, withClient, withClientOptions } from "./shared";

type SetAlertsOpts = ClientOpts & {
  daily?: number;
  dailySms?: boolean;
  monthly?: number;
  monthlySms?: boolean;
};

// Options left out disable the matching alert.
export function alertSettingsFromOptions(opts: SetAlertsOpts): AlertSettings {
  const daily = opts.daily !== undefined;
  const monthly = opts.monthly !== undefined;
  return {
    dailyEnabled: daily,
    dailyThreshold: opts.daily ?? null,
    dailyNotifEmail: daily ? true : null,
    dailyNotifSms: daily ? !!opts.dailySms : null,
    monthlyEnabled: monthly,
    monthlyThreshold: opts.monthly ?? null,
    monthlyNotifEmail: monthly ? true : null,
    monthlyNotifSms: monthly ? !!opts.monthlySms : null,
  };
}

const alerts = new Command("alerts")
  .description("Consumption alert thresholds")
  .action(function (this: Command) {
    this.outputHelp();
  });

withClientOptions(
  alerts
    .command("get")
    .description("Show the current alert settings"),
).action(async (opts: ClientOpts) => {
  await withClient(opts, async (client) => {
    const settings = await client.getAlerts();
    log.out(formatOutput(settings, opts.format));
  });
});

withClientOptions(
  alerts
    .command("set")
    .description("Replace the alert settings (email notification is always on)")
    .option("--daily <liters>", "Enable the daily alert above this many liters (min 100)", parseIntArg)
    .option("--daily-sms", "Also notify the daily alert by SMS")
    .option("--monthly <m3>", "Enable the monthly alert above this many m3 (min 1)", parseIntArg)
    .option("--monthly-sms", "Also notify the monthly alert by SMS"),
).action(async (opts: SetAlertsOpts) => {
  await withClient(opts, async (client) => {
    const settings = alertSettingsFromOptions(opts);
    await client.setAlerts(settings);
    log.info("✓ Alert settings saved.");
    log.out(formatOutput(settings, opts.format));
  });
});

export const alertsCommand = alerts;
