import path from "node:path";
import fs from "node:fs/promises";
import { InvalidStateError, StateNotFoundError } from "./errors.js";
import { emptyState, parseState, STATE_FILE_NAME, type State, type StateProvider } from "./state.js";

function isNotFoundError(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class StateStore implements StateProvider {
  readonly stateDir: string;

  constructor(stateDir: string) {
    this.stateDir = stateDir;
  }

  get statePath() {
    return path.join(this.stateDir, STATE_FILE_NAME);
  }

  get terraformStatePath() {
    return path.join(this.stateDir, "vars", "terraform.tfstate");
  }

  /**
   * Loads the state, or an empty state when the directory has no state file yet.
   */
  async get(): Promise<State> {
    let content: string;
    try {
      content = await fs.readFile(this.statePath, "utf8");
    } catch (error) {
      if (isNotFoundError(error)) {
        return emptyState();
      }

      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new InvalidStateError(`${STATE_FILE_NAME} is not valid JSON`, error);
    }

    return parseState(json);
  }
}

export class StateValidator {
  #store: StateStore;

  constructor(store: StateStore) {
    this.#store = store;
  }

  /**
   * Ensures the state file exists in the state directory and that the loaded
   * state belongs to an environment.
   */
  async validate(state: State): Promise<void> {
    try {
      await fs.access(this.#store.statePath);
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new StateNotFoundError(this.#store.stateDir);
      }

      throw error;
    }

    if (state.envID === "") {
      throw new InvalidStateError("envID is missing");
    }
  }
}
