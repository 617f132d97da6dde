import { $ as Execa$ } from "execa";
import type { TemplateExpression as ExecaTemplateExpression } from "execa";
import {
  ensureCommandPrefix,
  parseJsonOutput,
  type CliInvocationOptions,
  type CliInvoker,
  type CliTemplateExpression,
  type CliTemplateExpressionItem,
} from "./cliInvoker.js";

function isExpressionList(e: CliTemplateExpression): e is readonly CliTemplateExpressionItem[] {
  return Array.isArray(e);
}

function prepareExpressionItem(e: CliTemplateExpressionItem): string | number {
  if (e == null) {
    return "";
  }

  switch (typeof e) {
    case "number":
    case "string":
      return e;
    default:
      return e.toString();
  }
}

export function prepareExpression(e: CliTemplateExpression): ExecaTemplateExpression {
  if (isExpressionList(e)) {
    return e.map(prepareExpressionItem);
  }

  return prepareExpressionItem(e);
}

function getToolEnv(options: CliInvocationOptions): NodeJS.ProcessEnv | undefined {
  if (options.commandPrefix !== "az") {
    return options.env;
  }

  return {
    ...options.env,
    AZURE_CORE_OUTPUT: "json", // request json by default
    AZURE_CORE_ONLY_SHOW_ERRORS: "true", // warnings on stderr are noise for scripted calls
    AZURE_CORE_DISABLE_PROGRESS_BAR: "true", // avoid progress bars and spinners
    AZURE_CORE_NO_COLOR: "true", // keeps escape codes out of stdout and stderr
    AZURE_CORE_LOGIN_EXPERIENCE_V2: "off", // accounts are selected by flags, not interactively
  };
}

export function execaCliInvokerFactory(options: CliInvocationOptions): CliInvoker {
  const execaInvoker = Execa$({
    env: getToolEnv(options),
    cwd: options.cwd,
    stdin: "inherit",
    stdout: "pipe",
    stderr: "pipe",
    cancelSignal: options.abortSignal,
  });

  return {
    strict: async (templates, ...expressions) => {
      if (options.commandPrefix) {
        templates = ensureCommandPrefix(templates, options.commandPrefix);
      }

      const { stdout, stderr } = await execaInvoker(templates, ...expressions.map(prepareExpression));

      if (typeof stderr === "string" && stderr !== "") {
        console.warn(stderr);
      }

      if (typeof stdout !== "string") {
        throw new Error("Failed to parse invocation result");
      }

      const result = parseJsonOutput(stdout);
      if (result == null) {
        throw new Error("Resulting stream was empty");
      }

      return result;
    },
  };
}
