/**
 * A cloud resource that leftovers can show to the user and then delete.
 */
export interface Deletable {
  readonly name: string;
  readonly type: string;
  delete(): Promise<void>;
}

export interface ListOptions {
  /** When false, matching resources are returned without asking the prompter. Defaults to true. */
  prompt?: boolean;
}

export interface Lister {
  list(filter: string, options?: ListOptions): Promise<Deletable[]>;
}

export interface DeletionPrompter {
  /**
   * Asks whether a single resource may be included for deletion.
   * @returns true to include the resource.
   */
  promptWithDetails(resourceType: string, name: string): Promise<boolean>;
}
