import path from "node:path";
import type { Command } from "./command.js";
import type { CredhubGetter } from "./credhubGetter.js";
import type { FileIO } from "./fileIO.js";
import type { Logger } from "./logger.js";
import type { SshKeyGetter } from "./sshKeyGetter.js";
import type { State } from "./state.js";
import type { StateValidator } from "./stateStore.js";
import type { TerraformManager } from "./terraformManager.js";

export const JUMPBOX_PRIVATE_KEY_FILE_NAME = "bosh_jumpbox_private.key";
const DIRECTOR_PORT = 25555;

/**
 * Outcome of one step of the export sequence. Warnings are reported and the
 * sequence continues; a fatal result stops it with the original error.
 */
export type StepResult =
  | { severity: "ok"; lines: string[] }
  | { severity: "warning"; warning: string }
  | { severity: "fatal"; error: unknown };

async function requiredStep(run: () => Promise<string[]>): Promise<StepResult> {
  try {
    return { severity: "ok", lines: await run() };
  } catch (error) {
    return { severity: "fatal", error };
  }
}

async function optionalStep(run: () => Promise<string[]>, warning: string): Promise<StepResult> {
  try {
    return { severity: "ok", lines: await run() };
  } catch {
    return { severity: "warning", warning };
  }
}

export interface PrintEnvDependencies {
  logger: Logger;
  stderrLogger: Logger;
  stateValidator: Pick<StateValidator, "validate">;
  sshKeyGetter: Pick<SshKeyGetter, "get">;
  credhubGetter: Pick<CredhubGetter, "getServer" | "getCerts" | "getPassword">;
  terraformManager: Pick<TerraformManager, "getOutputs">;
  fileIO: FileIO;
}

export class PrintEnv implements Command {
  static readonly usage = "Prints required BOSH environment variables";

  #dependencies: PrintEnvDependencies;

  constructor(dependencies: PrintEnvDependencies) {
    this.#dependencies = dependencies;
  }

  async checkFastFails(_args: string[], state: State): Promise<void> {
    await this.#dependencies.stateValidator.validate(state);
  }

  async execute(_args: string[], state: State): Promise<void> {
    const { credhubGetter } = this.#dependencies;

    if (state.noDirector) {
      this.#report(await requiredStep(() => this.#environmentFromOutputs()));
      return;
    }

    const steps: (() => Promise<StepResult>)[] = [
      () => requiredStep(async () => this.#directorLines(state)),
      () =>
        optionalStep(async () => [`export CREDHUB_SERVER=${await credhubGetter.getServer()}`], "No credhub server found."),
      () =>
        optionalStep(async () => [`export CREDHUB_CA_CERT='${await credhubGetter.getCerts()}'`], "No credhub certs found."),
      () =>
        optionalStep(
          async () => ["export CREDHUB_USER=credhub-cli", `export CREDHUB_PASSWORD=${await credhubGetter.getPassword()}`],
          "No credhub password found.",
        ),
      () => requiredStep(() => this.#jumpboxLines(state)),
    ];

    for (const step of steps) {
      this.#report(await step());
    }
  }

  #report(result: StepResult): void {
    switch (result.severity) {
      case "ok":
        for (const line of result.lines) {
          this.#dependencies.logger.println(line);
        }
        break;
      case "warning":
        this.#dependencies.stderrLogger.println(result.warning);
        break;
      case "fatal":
        throw result.error;
    }
  }

  async #environmentFromOutputs(): Promise<string[]> {
    const outputs = await this.#dependencies.terraformManager.getOutputs();
    return [`export BOSH_ENVIRONMENT=https://${outputs.getString("external_ip")}:${DIRECTOR_PORT}`];
  }

  #directorLines(state: State): string[] {
    return [
      `export BOSH_CLIENT=${state.bosh.directorUsername}`,
      `export BOSH_CLIENT_SECRET=${state.bosh.directorPassword}`,
      `export BOSH_CA_CERT='${state.bosh.directorSSLCA}'`,
      `export BOSH_ENVIRONMENT=${state.bosh.directorAddress}`,
    ];
  }

  async #jumpboxLines(state: State): Promise<string[]> {
    const { sshKeyGetter, fileIO } = this.#dependencies;

    const privateKey = await sshKeyGetter.get("jumpbox");
    const dir = await fileIO.tempDir();
    const privateKeyPath = path.join(dir, JUMPBOX_PRIVATE_KEY_FILE_NAME);
    await fileIO.writeFile(privateKeyPath, Buffer.from(privateKey, "utf8"));

    return [
      `export JUMPBOX_PRIVATE_KEY=${privateKeyPath}`,
      `export BOSH_ALL_PROXY=ssh+socks5://jumpbox@${state.jumpbox.url}?private-key=$JUMPBOX_PRIVATE_KEY`,
    ];
  }
}
