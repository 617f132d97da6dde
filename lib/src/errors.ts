export class ListingError extends Error {
  resourceKind: string;

  constructor(resourceKind: string, cause: unknown) {
    super(`Listing ${resourceKind}: ${describeCause(cause)}`, { cause });

    this.name = "ListingError";
    this.resourceKind = resourceKind;
  }
}

export class DeletionError extends Error {
  resourceType: string;
  resourceName: string;

  constructor(resourceType: string, resourceName: string, cause: unknown) {
    super(`Delete ${resourceName}: ${describeCause(cause)}`, { cause });

    this.name = "DeletionError";
    this.resourceType = resourceType;
    this.resourceName = resourceName;
  }
}

export class StateNotFoundError extends Error {
  stateDir: string;

  constructor(stateDir: string) {
    super(
      `bootrig-state.json not found in ${JSON.stringify(stateDir)}, ensure you're running this command in the proper state directory`,
    );

    this.name = "StateNotFoundError";
    this.stateDir = stateDir;
  }
}

export class InvalidStateError extends Error {
  constructor(reason: string, cause?: unknown) {
    super(`State is not valid: ${reason}`, cause == null ? undefined : { cause });

    this.name = "InvalidStateError";
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }

  return String(cause);
}
