import { createInterface } from "node:readline";

export type Confirm = (question: string) => Promise<boolean>;

/** y/N prompt: only "y" or "yes" count as consent. */
export function askYesNo(question: string): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.question(question, (answer) => {
      rl.close();
      const trimmed = answer.trim().toLowerCase();
      resolve(trimmed === "y" || trimmed === "yes");
    });
  });
}

/** Interactive confirmation, or undefined when stdin is not a terminal. */
export function terminalConfirm(): Confirm | undefined {
  return process.stdin.isTTY ? askYesNo : undefined;
}
