import path from "node:path";
import { isSubscriptionId, type SubscriptionId } from "./azureUtils.js";

export interface CliOptions {
  stateDir?: string;
  subscriptionId?: string;
  filter?: string;
  /** Set to false by `--no-confirm` */
  confirm?: boolean;
  dryRun?: boolean;
}

export interface BootrigConfig {
  stateDir: string;
  subscriptionId: SubscriptionId | null;
  filter: string;
  noConfirm: boolean;
  dryRun: boolean;
}

function isEnabledFlag(value: string | undefined) {
  return value != null && /^(true|1)$/i.test(value.trim());
}

/**
 * Merges command line options with environment variables. Options win.
 */
export function resolveConfig(
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): BootrigConfig {
  const stateDir = path.resolve(cwd, options.stateDir ?? env.BOOTRIG_STATE_DIR ?? ".");

  const subscriptionId = options.subscriptionId ?? env.AZURE_SUBSCRIPTION_ID ?? null;
  if (subscriptionId != null && !isSubscriptionId(subscriptionId)) {
    throw new Error(`Subscription ID ${subscriptionId} is not valid`);
  }

  return {
    stateDir,
    subscriptionId,
    filter: options.filter ?? "",
    noConfirm: options.confirm === false || isEnabledFlag(env.BOOTRIG_NO_CONFIRM),
    dryRun: options.dryRun ?? false,
  };
}
