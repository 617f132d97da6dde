/**
 * A line oriented output sink.
 */
export interface Logger {
  println(message: string): void;
}

export type ConsoleStream = "stdout" | "stderr";

export class ConsoleLogger implements Logger {
  #stream: ConsoleStream;

  constructor(stream: ConsoleStream = "stdout") {
    this.#stream = stream;
  }

  println(message: string): void {
    if (this.#stream === "stderr") {
      console.error(message);
    } else {
      console.log(message);
    }
  }
}
