import type { StateProvider } from "./state.js";
import { parseVariables, requireVariable } from "./variables.js";

const CREDHUB_PORT = 8844;

/**
 * Reads credhub connection details from the director deployment.
 */
export class CredhubGetter {
  #stateProvider: StateProvider;

  constructor(stateProvider: StateProvider) {
    this.#stateProvider = stateProvider;
  }

  async getServer(): Promise<string> {
    const state = await this.#stateProvider.get();
    const directorAddress = state.bosh.directorAddress;
    if (directorAddress === "") {
      throw new Error("No director address found");
    }

    let hostname: string;
    try {
      hostname = new URL(directorAddress).hostname;
    } catch (error) {
      throw new Error(`Director address ${directorAddress} is not a URL`, { cause: error });
    }

    return `https://${hostname}:${CREDHUB_PORT}`;
  }

  async getCerts(): Promise<string> {
    const variables = await this.#getDirectorVariables();
    const credhubCA = requireVariable(variables, "credhub_tls.ca", "director");
    const uaaCA = requireVariable(variables, "uaa_ssl.ca", "director");
    return `${credhubCA}\n${uaaCA}`;
  }

  async getPassword(): Promise<string> {
    const variables = await this.#getDirectorVariables();
    return requireVariable(variables, "credhub_cli_user_password", "director");
  }

  async #getDirectorVariables() {
    const state = await this.#stateProvider.get();
    return parseVariables(state.bosh.variables, "director");
  }
}
