import type { State, StateProvider } from "./state.js";
import { parseVariables, requireVariable } from "./variables.js";

export type DeploymentName = "jumpbox" | "director";

function selectVariables(state: State, deployment: string): string {
  switch (deployment) {
    case "jumpbox":
      return state.jumpbox.variables;
    case "director":
      return state.bosh.variables;
    default:
      throw new Error(`Unknown deployment ${deployment}`);
  }
}

export class SshKeyGetter {
  #stateProvider: StateProvider;

  constructor(stateProvider: StateProvider) {
    this.#stateProvider = stateProvider;
  }

  /**
   * @returns The private key of the `jumpbox_ssh` credential for a deployment.
   */
  async get(deployment: DeploymentName): Promise<string> {
    const state = await this.#stateProvider.get();
    const variables = parseVariables(selectVariables(state, deployment), deployment);
    return requireVariable(variables, "jumpbox_ssh.private_key", deployment);
  }
}
