import { parse as parseYaml } from "yaml";
import { getPath, isNonEmptyString, isRecord } from "./tsUtils.js";

/**
 * Parses deployment variables stored as YAML in the state.
 * @param source Names the variables in error messages, for example "jumpbox".
 */
export function parseVariables(yamlText: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlText);
  } catch (error) {
    throw new Error(`Failed to parse ${source} variables`, { cause: error });
  }

  if (parsed == null) {
    return {};
  }

  if (!isRecord(parsed)) {
    throw new Error(`The ${source} variables are not a map`);
  }

  return parsed;
}

export function requireVariable(variables: Record<string, unknown>, path: string, source: string): string {
  const value = getPath(variables, path);
  if (!isNonEmptyString(value)) {
    throw new Error(`Could not find ${path} in the ${source} variables`);
  }

  return value;
}
