import inquirer from "inquirer";
import type { DeletionPrompter } from "./deletable.js";
import { ConsoleLogger, type Logger } from "./logger.js";

export type ConfirmFn = (message: string) => Promise<boolean>;

export interface ConfirmationLoggerOptions {
  /** Answer every prompt with yes. */
  noConfirm?: boolean;
  confirm?: ConfirmFn;
  output?: Logger;
}

async function inquirerConfirm(message: string): Promise<boolean> {
  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: "confirm",
      name: "proceed",
      message,
      default: false,
    },
  ]);
  return proceed;
}

export class ConfirmationLogger implements DeletionPrompter, Logger {
  #noConfirm: boolean;
  #confirm: ConfirmFn;
  #output: Logger;

  constructor(options?: ConfirmationLoggerOptions) {
    this.#noConfirm = options?.noConfirm ?? false;
    this.#confirm = options?.confirm ?? inquirerConfirm;
    this.#output = options?.output ?? new ConsoleLogger("stdout");
  }

  println(message: string): void {
    this.#output.println(message);
  }

  async promptWithDetails(resourceType: string, name: string): Promise<boolean> {
    if (this.#noConfirm) {
      return true;
    }

    return await this.#confirm(`[${resourceType}: ${name}] Delete?`);
  }
}
