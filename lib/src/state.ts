import { InvalidStateError } from "./errors.js";
import { isRecord } from "./tsUtils.js";

export const STATE_FILE_NAME = "bootrig-state.json";

export interface BoshState {
  directorName: string;
  directorUsername: string;
  directorPassword: string;
  directorAddress: string;
  directorSSLCA: string;
  /** Director deployment variables as YAML */
  variables: string;
}

export interface JumpboxState {
  /** host:port of the jumpbox */
  url: string;
  /** Jumpbox deployment variables as YAML */
  variables: string;
}

export interface AzureState {
  subscriptionId: string;
  tenantId: string;
  location: string;
}

export interface State {
  version: number;
  iaas: string;
  envID: string;
  noDirector: boolean;
  bosh: BoshState;
  jumpbox: JumpboxState;
  azure: AzureState;
}

export function emptyState(): State {
  return {
    version: 0,
    iaas: "",
    envID: "",
    noDirector: false,
    bosh: {
      directorName: "",
      directorUsername: "",
      directorPassword: "",
      directorAddress: "",
      directorSSLCA: "",
      variables: "",
    },
    jumpbox: {
      url: "",
      variables: "",
    },
    azure: {
      subscriptionId: "",
      tenantId: "",
      location: "",
    },
  };
}

function readSection(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  if (value == null) {
    return {};
  }

  if (!isRecord(value)) {
    throw new InvalidStateError(`${key} must be an object`);
  }

  return value;
}

function readString(source: Record<string, unknown>, key: string, path: string): string {
  const value = source[key];
  if (value == null) {
    return "";
  }

  if (typeof value !== "string") {
    throw new InvalidStateError(`${path} must be a string`);
  }

  return value;
}

/**
 * Reads a state document, filling absent fields with empty values.
 */
export function parseState(value: unknown): State {
  if (!isRecord(value)) {
    throw new InvalidStateError("expected an object");
  }

  const version = value.version ?? 0;
  if (typeof version !== "number") {
    throw new InvalidStateError("version must be a number");
  }

  const noDirector = value.noDirector ?? false;
  if (typeof noDirector !== "boolean") {
    throw new InvalidStateError("noDirector must be a boolean");
  }

  const bosh = readSection(value, "bosh");
  const jumpbox = readSection(value, "jumpbox");
  const azure = readSection(value, "azure");

  return {
    version,
    iaas: readString(value, "iaas", "iaas"),
    envID: readString(value, "envID", "envID"),
    noDirector,
    bosh: {
      directorName: readString(bosh, "directorName", "bosh.directorName"),
      directorUsername: readString(bosh, "directorUsername", "bosh.directorUsername"),
      directorPassword: readString(bosh, "directorPassword", "bosh.directorPassword"),
      directorAddress: readString(bosh, "directorAddress", "bosh.directorAddress"),
      directorSSLCA: readString(bosh, "directorSSLCA", "bosh.directorSSLCA"),
      variables: readString(bosh, "variables", "bosh.variables"),
    },
    jumpbox: {
      url: readString(jumpbox, "url", "jumpbox.url"),
      variables: readString(jumpbox, "variables", "jumpbox.variables"),
    },
    azure: {
      subscriptionId: readString(azure, "subscriptionId", "azure.subscriptionId"),
      tenantId: readString(azure, "tenantId", "azure.tenantId"),
      location: readString(azure, "location", "azure.location"),
    },
  };
}

export interface StateProvider {
  get(): Promise<State>;
}
