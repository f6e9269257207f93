import { Command } from "commander";
import process from "node:process";
import { log } from "../lib/log";
import { type ClientOpts, formatOutput, withClient, withClientOptions } from "./shared";

const auth = new Command("auth")
  .description("Authenticate against the customer portal")
  .action(function (this: Command) {
    this.outputHelp();
  });

withClientOptions(
  auth
    .command("login")
    .description("Run the login flow and show the resolved account identifiers"),
).action(async (opts: ClientOpts) => {
  await withClient(opts, async (client) => {
    const ok = await client.login();
    if (!ok) {
      log.error("Login did not resolve every account identifier.");
      process.exitCode = 1;
      return;
    }

    const s = client.session;
    log.info(`✓ Authenticated. Access token valid until ${new Date(s.tokenExpiration * 1000).toISOString()}.`);
    log.out(formatOutput({
      subscriptionId: s.subscriptionId,
      meteringPointId: s.meteringPointId,
      contactId: s.contactId,
      customerId: s.customerId,
      meterNumber: s.meterNumber,
      subscriptionStartDate: s.subscriptionStartDate,
    }, opts.format));
  });
});

export const authCommand = auth;
