import type { CliInvoker } from "./cliInvoker.js";
import { isRecord } from "./tsUtils.js";

export class TerraformOutputs {
  readonly map: Readonly<Record<string, unknown>>;

  constructor(map: Record<string, unknown>) {
    this.map = map;
  }

  /**
   * @returns The output as a string, or an empty string when it is missing or not a string.
   */
  getString(key: string): string {
    const value = this.map[key];
    return typeof value === "string" ? value : "";
  }
}

/**
 * Unwraps the `{value, type, sensitive}` envelopes written by `terraform output -json`.
 */
export function parseTerraformOutputs(json: unknown): TerraformOutputs {
  if (!isRecord(json)) {
    throw new Error("Terraform outputs are not an object");
  }

  const map: Record<string, unknown> = {};
  for (const [key, envelope] of Object.entries(json)) {
    map[key] = isRecord(envelope) && "value" in envelope ? envelope.value : envelope;
  }

  return new TerraformOutputs(map);
}

interface TerraformManagerDependencies {
  /** Invoker bound to the terraform executable */
  invoker: CliInvoker;
  terraformStatePath: string;
}

export class TerraformManager {
  #invoker: CliInvoker;
  #terraformStatePath: string;

  constructor(dependencies: TerraformManagerDependencies) {
    this.#invoker = dependencies.invoker;
    this.#terraformStatePath = dependencies.terraformStatePath;
  }

  async getOutputs(): Promise<TerraformOutputs> {
    const json = await this.#invoker.strict<unknown>`output -json -state=${this.#terraformStatePath}`;
    return parseTerraformOutputs(json);
  }
}
