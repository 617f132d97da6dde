import type { Deletable, Lister, ListOptions } from "./deletable.js";
import type { Logger } from "./logger.js";
import { describeCause } from "./errors.js";

export interface LeftoversOptions {
  /** Log what would be deleted without deleting it. */
  dryRun?: boolean;
}

/**
 * Finds and deletes resources left behind by earlier environments.
 */
export class Leftovers {
  #listers: Lister[];
  #logger: Logger;
  #options: LeftoversOptions;

  constructor(listers: Lister[], logger: Logger, options?: LeftoversOptions) {
    this.#listers = listers;
    this.#logger = logger;
    this.#options = options ?? {};
  }

  /**
   * Lists every resource matching the filter without asking for confirmation.
   */
  async list(filter: string): Promise<Deletable[]> {
    const resources = await this.#listAll(filter, { prompt: false });
    for (const resource of resources) {
      this.#logger.println(`[${resource.type}: ${resource.name}]`);
    }

    return resources;
  }

  /**
   * Deletes every confirmed resource matching the filter.
   * @remarks
   * Every resource is attempted before failures are reported together.
   */
  async delete(filter: string): Promise<void> {
    const resources = await this.#listAll(filter, { prompt: true });

    const errors: Error[] = [];
    for (const resource of resources) {
      const label = `[${resource.type}: ${resource.name}]`;

      if (this.#options.dryRun) {
        this.#logger.println(`${label} Would delete`);
        continue;
      }

      this.#logger.println(`${label} Deleting...`);
      try {
        await resource.delete();
        this.#logger.println(`${label} Deleted!`);
      } catch (error) {
        this.#logger.println(`${label} ${describeCause(error)}`);
        errors.push(error instanceof Error ? error : new Error(describeCause(error)));
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Failed to delete ${errors.length} resource(s)`);
    }
  }

  async #listAll(filter: string, options: ListOptions): Promise<Deletable[]> {
    const resources: Deletable[] = [];
    for (const lister of this.#listers) {
      resources.push(...(await lister.list(filter, options)));
    }

    return resources;
  }
}
