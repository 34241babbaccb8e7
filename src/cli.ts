#!/usr/bin/env node
import { Command } from "commander";
import { formatApplyResults, formatPlan, formatServers, formatTransaction } from "./cli-format.js";
import { logger } from "./config/logger.js";
import { loadManifest } from "./manifest/manifest-loader.js";
import type { Manifest } from "./manifest/manifest-schema.js";
import { errorMessage } from "./provisioning/errors.js";
import {
  closeServices,
  getOrderService,
  getReconciler,
  getServerListCache,
  getServerRepo,
  setProviderCredentials,
} from "./services.js";

function withManifest(file: string): Manifest {
  const manifest = loadManifest(file);
  setProviderCredentials(manifest.provider);
  return manifest;
}

/** Run a command body, closing the state database and mapping failures to exit code 1. */
async function runCommand(body: () => Promise<boolean>): Promise<void> {
  let ok = false;
  try {
    ok = await body();
  } catch (err) {
    logger.error("Command failed", { error: errorMessage(err) });
    process.stderr.write(`error: ${errorMessage(err)}\n`);
  } finally {
    closeServices();
  }
  process.exitCode = ok ? 0 : 1;
}

const program = new Command("metal-provisioner")
  .description("Order, image and configure bare-metal servers through the Robot API")
  .version("0.1.0");

program
  .command("plan")
  .description("Show what apply would change")
  .argument("<manifest>", "YAML manifest")
  .action((file: string) =>
    runCommand(async () => {
      const manifest = withManifest(file);
      process.stdout.write(`${formatPlan(getReconciler().plan(manifest))}\n`);
      return true;
    }),
  );

program
  .command("apply")
  .description("Create, update and delete resources until state matches the manifest")
  .argument("<manifest>", "YAML manifest")
  .action((file: string) =>
    runCommand(async () => {
      const manifest = withManifest(file);
      const controller = new AbortController();
      const onSigint = () => {
        logger.warn("Interrupted, stopping after the current stage");
        controller.abort();
      };
      process.once("SIGINT", onSigint);
      try {
        const report = await getReconciler().apply(manifest, { signal: controller.signal });
        process.stdout.write(`${formatApplyResults(report.results)}\n`);
        return !report.failed;
      } finally {
        process.off("SIGINT", onSigint);
      }
    }),
  );

program
  .command("servers")
  .description("List the account's servers and which of them are managed")
  .action(() =>
    runCommand(async () => {
      const servers = await getServerListCache().list();
      process.stdout.write(`${formatServers(servers, getServerRepo().list())}\n`);
      return true;
    }),
  );

program
  .command("order-status")
  .description("Show an order transaction")
  .argument("<id>", "transaction id")
  .option("--market", "the transaction is a market (auction) order", false)
  .action((id: string, opts: { market: boolean }) =>
    runCommand(async () => {
      const tx = await getOrderService().transaction(id, opts.market);
      if (!tx) {
        process.stderr.write(`transaction ${id} not found\n`);
        return false;
      }
      process.stdout.write(`${formatTransaction(tx)}\n`);
      return true;
    }),
  );

await program.parseAsync(process.argv);
