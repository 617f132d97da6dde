import { Command } from "commander";
import { ResourceManagementClient } from "@azure/arm-resources";
import { buildCliCredential } from "./cliCredential.js";
import { resolveConfig, type CliOptions } from "./config.js";
import { ConfirmationLogger } from "./confirmationLogger.js";
import { CredhubGetter } from "./credhubGetter.js";
import { describeCause } from "./errors.js";
import { execaCliInvokerFactory } from "./execaCliInvoker.js";
import { NodeFileIO } from "./fileIO.js";
import { Leftovers } from "./leftovers.js";
import { ConsoleLogger } from "./logger.js";
import { PrintEnv } from "./printEnv.js";
import { ResourceGroups } from "./resourceGroups.js";
import { SshKeyGetter } from "./sshKeyGetter.js";
import { StateStore, StateValidator } from "./stateStore.js";
import { TerraformManager } from "./terraformManager.js";

export function reportFailure(error: unknown): void {
  const stderr = new ConsoleLogger("stderr");
  stderr.println(describeCause(error));
  if (error instanceof AggregateError) {
    for (const inner of error.errors) {
      stderr.println(`  ${describeCause(inner)}`);
    }
  }

  process.exitCode = 1;
}

async function runPrintEnv(options: CliOptions, abortSignal: AbortSignal) {
  const config = resolveConfig(options);
  const stateStore = new StateStore(config.stateDir);
  const printEnv = new PrintEnv({
    logger: new ConsoleLogger("stdout"),
    stderrLogger: new ConsoleLogger("stderr"),
    stateValidator: new StateValidator(stateStore),
    sshKeyGetter: new SshKeyGetter(stateStore),
    credhubGetter: new CredhubGetter(stateStore),
    terraformManager: new TerraformManager({
      invoker: execaCliInvokerFactory({ commandPrefix: "terraform", cwd: config.stateDir, abortSignal }),
      terraformStatePath: stateStore.terraformStatePath,
    }),
    fileIO: new NodeFileIO(),
  });

  const state = await stateStore.get();
  await printEnv.checkFastFails([], state);
  await printEnv.execute([], state);
}

async function runLeftovers(options: CliOptions & { list?: boolean }, abortSignal: AbortSignal) {
  const config = resolveConfig(options);
  if (config.subscriptionId == null) {
    throw new Error("A subscription ID is required, pass --subscription-id or set AZURE_SUBSCRIPTION_ID");
  }

  const invoker = execaCliInvokerFactory({ commandPrefix: "az", abortSignal });
  const credential = buildCliCredential(invoker, { subscriptionId: config.subscriptionId });
  const client = new ResourceManagementClient(credential, config.subscriptionId);

  const logger = new ConfirmationLogger({ noConfirm: config.noConfirm });
  const leftovers = new Leftovers([new ResourceGroups(client.resourceGroups, logger, { abortSignal })], logger, {
    dryRun: config.dryRun,
  });

  if (options.list) {
    await leftovers.list(config.filter);
  } else {
    await leftovers.delete(config.filter);
  }
}

export function buildProgram(abortSignal: AbortSignal): Command {
  const program = new Command();
  program.name("bootrig").description("Work with BOSH environments and clean up what they leave behind");

  program
    .command("print-env")
    .description(PrintEnv.usage)
    .option("-s, --state-dir <dir>", "Directory containing bootrig-state.json")
    .action(async (options: CliOptions) => {
      await runPrintEnv(options, abortSignal).catch(reportFailure);
    });

  program
    .command("leftovers")
    .description("Deletes Azure resource groups whose name contains the filter")
    .option("-f, --filter <text>", "Text a resource group name must contain", "")
    .option("--subscription-id <id>", "The Azure subscription to clean up")
    .option("--no-confirm", "Delete without asking about each resource group")
    .option("--dry-run", "Show what would be deleted")
    .option("--list", "Only list matching resource groups")
    .action(async (options: CliOptions & { list?: boolean }) => {
      await runLeftovers(options, abortSignal).catch(reportFailure);
    });

  return program;
}
