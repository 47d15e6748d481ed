/**
 * TTY Input Utilities
 * Handles stdin fallback to /dev/tty for piped environments
 */

import { openSync } from "node:fs";
import { createInterface } from "node:readline";
import { ReadStream } from "node:tty";

let ttyStream: ReadStream | null = null;

/**
 * Get a TTY-capable input stream
 * Falls back to /dev/tty when stdin is piped
 */
export function getTTYInputStream(): typeof process.stdin | ReadStream {
  if (process.stdin.isTTY) {
    return process.stdin;
  }

  if (!ttyStream) {
    try {
      ttyStream = new ReadStream(openSync("/dev/tty", "r"));
    } catch {
      return process.stdin;
    }
  }
  return ttyStream;
}

/**
 * Whether interactive input is possible at all
 */
export function hasTTY(): boolean {
  return process.stdin.isTTY || ttyStream !== null;
}

/**
 * Close the TTY stream if we opened one
 */
export function closeTTYStream(): void {
  if (ttyStream) {
    ttyStream.destroy();
    ttyStream = null;
  }
}

/**
 * Prompt for input (single line)
 */
export async function prompt(question: string): Promise<string> {
  const input = getTTYInputStream();
  const rl = createInterface({
    input,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Prompt for hidden input (API key)
 * Characters are echoed as asterisks
 */
export async function promptHidden(question: string): Promise<string> {
  const input = getTTYInputStream();

  return new Promise((resolve) => {
    process.stdout.write(question);

    let value = "";

    // Piped stdin has no raw mode
    if (input.isTTY && typeof input.setRawMode === "function") {
      input.setRawMode(true);
      input.resume();
      input.setEncoding("utf8");

      const onData = (char: string) => {
        if (char === "\n" || char === "\r" || char === "\u0004") {
          input.setRawMode(false);
          input.pause();
          input.removeListener("data", onData);
          process.stdout.write("\n");
          resolve(value);
        } else if (char === "\u0003") {
          // Ctrl+C
          input.setRawMode(false);
          process.stdout.write("\n");
          process.exit(1);
        } else if (char === "\u007F" || char === "\b") {
          if (value.length > 0) {
            value = value.slice(0, -1);
            process.stdout.write("\b \b");
          }
        } else if (char >= " ") {
          // May be several characters when pasting
          value += char;
          process.stdout.write("*".repeat(char.length));
        }
      };

      input.on("data", onData);
    } else {
      const rl = createInterface({ input, output: process.stdout });
      rl.question("", (answer) => {
        rl.close();
        resolve(answer);
      });
    }
  });
}

/**
 * Prompt for selection from a list (returns a 0-based index)
 */
export async function promptSelect(question: string, options: string[], defaultIndex = 0): Promise<number> {
  for (let i = 0; i < options.length; i++) {
    const marker = i === defaultIndex ? "→" : " ";
    console.log(`   ${marker} ${i + 1}. ${options[i]}`);
  }
  console.log();

  const answer = await prompt(question);
  const index = parseInt(answer, 10) - 1;

  if (isNaN(index) || index < 0 || index >= options.length) {
    return defaultIndex;
  }
  return index;
}

/**
 * Prompt for yes/no confirmation
 */
export async function promptConfirm(question: string, defaultYes = true): Promise<boolean> {
  const hint = defaultYes ? "(Y/n)" : "(y/N)";
  const answer = await prompt(`${question} ${hint}: `);

  if (answer === "") return defaultYes;
  return answer.toLowerCase().startsWith("y");
}
