export type { Deletable, DeletionPrompter, Lister, ListOptions } from "./src/deletable.js";
export type { Command } from "./src/command.js";
export type { CliInvoker, CliInvocationOptions } from "./src/cliInvoker.js";
export type { FileIO } from "./src/fileIO.js";
export type { Logger } from "./src/logger.js";
export type { State, BoshState, JumpboxState, AzureState, StateProvider } from "./src/state.js";
export type { StepResult, PrintEnvDependencies } from "./src/printEnv.js";
export { ListingError, DeletionError, StateNotFoundError, InvalidStateError } from "./src/errors.js";
export { isSubscriptionId, isTenantId } from "./src/azureUtils.js";
export { buildCliCredential } from "./src/cliCredential.js";
export { execaCliInvokerFactory } from "./src/execaCliInvoker.js";
export { ResourceGroup, ResourceGroups, type GroupsClient, type ResourceGroupsOptions } from "./src/resourceGroups.js";
export { Leftovers } from "./src/leftovers.js";
export { ConfirmationLogger } from "./src/confirmationLogger.js";
export { ConsoleLogger } from "./src/logger.js";
export { emptyState, parseState } from "./src/state.js";
export { StateStore, StateValidator } from "./src/stateStore.js";
export { TerraformManager, TerraformOutputs } from "./src/terraformManager.js";
export { SshKeyGetter } from "./src/sshKeyGetter.js";
export { CredhubGetter } from "./src/credhubGetter.js";
export { NodeFileIO } from "./src/fileIO.js";
export { PrintEnv } from "./src/printEnv.js";
export { resolveConfig } from "./src/config.js";
