import type {
  ResourceGroup as AzureResourceGroup,
  ResourceGroupsDeleteOptionalParams,
  ResourceGroupsListOptionalParams,
} from "@azure/arm-resources";
import { isRestError } from "@azure/core-rest-pipeline";
import type { Deletable, DeletionPrompter, Lister, ListOptions } from "./deletable.js";
import { DeletionError, ListingError } from "./errors.js";
import { hasName } from "./azureUtils.js";

/**
 * The subset of `ResourceManagementClient.resourceGroups` used here.
 */
export interface GroupsClient {
  list(options?: ResourceGroupsListOptionalParams): AsyncIterable<AzureResourceGroup>;
  beginDeleteAndWait(resourceGroupName: string, options?: ResourceGroupsDeleteOptionalParams): Promise<void>;
}

export interface ResourceGroupsOptions {
  /** Cancels in-flight listing and deletion requests. */
  abortSignal?: AbortSignal;
}

export class ResourceGroup implements Deletable {
  readonly type = "Resource Group";
  readonly name: string;
  #client: GroupsClient;
  #abortSignal?: AbortSignal;

  constructor(client: GroupsClient, name: string, options?: ResourceGroupsOptions) {
    this.#client = client;
    this.name = name;
    this.#abortSignal = options?.abortSignal;
  }

  async delete(): Promise<void> {
    try {
      await this.#client.beginDeleteAndWait(this.name, { abortSignal: this.#abortSignal });
    } catch (error) {
      if (isRestError(error) && error.statusCode === 404) {
        return; // already gone
      }

      throw new DeletionError(this.type, this.name, error);
    }
  }
}

export class ResourceGroups implements Lister {
  #client: GroupsClient;
  #prompter: DeletionPrompter;
  #options: ResourceGroupsOptions;

  constructor(client: GroupsClient, prompter: DeletionPrompter, options?: ResourceGroupsOptions) {
    this.#client = client;
    this.#prompter = prompter;
    this.#options = options ?? {};
  }

  /**
   * Lists resource groups containing the filter in their name, asking the
   * prompter about each one unless `options.prompt` is false.
   * @param filter Text that must appear in the group name. Empty matches all groups.
   * @returns The confirmed groups in the order Azure returned them.
   */
  async list(filter: string, options?: ListOptions): Promise<Deletable[]> {
    const groups: AzureResourceGroup[] = [];
    try {
      for await (const group of this.#client.list({ abortSignal: this.#options.abortSignal })) {
        groups.push(group);
      }
    } catch (error) {
      throw new ListingError("Resource Groups", error);
    }

    const results: Deletable[] = [];
    for (const group of groups) {
      if (!hasName(group)) {
        continue;
      }

      const resource = new ResourceGroup(this.#client, group.name, this.#options);

      if (!resource.name.includes(filter)) {
        continue;
      }

      if (options?.prompt !== false) {
        const proceed = await this.#prompter.promptWithDetails(resource.type, resource.name);
        if (!proceed) {
          continue;
        }
      }

      results.push(resource);
    }

    return results;
  }
}
