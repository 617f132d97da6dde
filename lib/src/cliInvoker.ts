import type { Stringy } from "./tsUtils.js";

export type CliTemplateExpressionItem =
  | undefined // optional state and SDK properties are common arguments
  | null
  | string
  | number
  | boolean
  | Stringy;
export type CliTemplateExpression = CliTemplateExpressionItem | readonly CliTemplateExpressionItem[];

export interface CliInvocationOptions {
  /** Executable that is put in front of commands that do not already start with it, such as `az` */
  commandPrefix?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  abortSignal?: AbortSignal;
}

export interface CliTemplateFn {
  <TResult>(templates: TemplateStringsArray, ...expressions: readonly CliTemplateExpression[]): Promise<TResult>;
}

/**
 * Runs a command line tool that writes JSON to stdout.
 * @remarks
 * Rejects on any failure or blank output.
 */
export interface CliInvoker {
  strict: CliTemplateFn;
}

function escapeRegExp(value: string) {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function ensureCommandPrefix(templates: TemplateStringsArray, prefix: string): TemplateStringsArray {
  const prefixPattern = new RegExp(`^\\s*${escapeRegExp(prefix)}\\s`, "i");
  if (templates.length > 0 && !prefixPattern.test(templates[0])) {
    const [firstCookedTemplate, ...remainingCookedTemplates] = templates;
    const [firstRawTemplate, ...remainingRawTemplates] = templates.raw;
    templates = Object.assign([`${prefix} ${firstCookedTemplate}`, ...remainingCookedTemplates], {
      raw: [`${prefix} ${firstRawTemplate}`, ...remainingRawTemplates],
    });
  }

  return templates;
}

export function parseJsonOutput(value: string) {
  if (value.trim() === "") {
    return null;
  }

  return JSON.parse(value);
}
