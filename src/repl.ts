/**
 * Console loop: prompt, read a line, dispatch, print.
 *
 * Runs until `close`/`exit` or end of input. Both paths save the book and
 * print "Good bye!". Errors from the store propagate to the caller.
 */

import readline from "node:readline";
import { closeSession, dispatch, type CommandContext } from "./commands.js";

export const WELCOME = "Welcome to the assistant bot!";
export const PROMPT = "Enter a command: ";

export interface ReplIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export async function runRepl(
  context: CommandContext,
  io: ReplIo = { input: process.stdin, output: process.stdout },
): Promise<void> {
  const { input, output } = io;
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  output.write(`${WELCOME}\n`);
  output.write(PROMPT);

  try {
    for await (const line of rl) {
      const outcome = dispatch(line, context);
      if (outcome.output !== undefined) {
        output.write(`${outcome.output}\n`);
      }
      if (outcome.terminated) return;
      output.write(PROMPT);
    }

    // Input ended (Ctrl-D or closed pipe) without an exit command
    const outcome = closeSession(context);
    output.write(`\n${outcome.output ?? ""}\n`);
  } finally {
    rl.close();
  }
}
