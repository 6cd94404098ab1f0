/**
 * Hidden terminal input for the CLI password prompt
 *
 * On a TTY the input is read in raw mode and echoed as "*". Piped input
 * (`echo pw | glucose-report export ...`) is read as a single line.
 */

import { createInterface } from "readline";
import { ReadStream } from "tty";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

function askLine(question: string, { input, output }: PromptStreams): Promise<string> {
  return new Promise((resolve, reject) => {
    const rl = createInterface({ input, output, terminal: false });
    let answered = false;

    rl.on("close", () => {
      if (!answered) {
        reject(new Error("No input before end of stream"));
      }
    });

    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

function askRaw(question: string, stdin: ReadStream, output: NodeJS.WritableStream): Promise<string> {
  return new Promise((resolve, reject) => {
    output.write(question);
    let input = "";
    const wasRaw = stdin.isRaw;

    stdin.setRawMode(true);
    stdin.resume();
    stdin.setEncoding("utf8");

    const finish = () => {
      stdin.removeListener("data", onData);
      stdin.setRawMode(wasRaw);
      stdin.pause();
      output.write("\n");
    };

    // A chunk may hold several keys (paste, fast typing)
    const onData = (chunk: string) => {
      for (const char of chunk) {
        switch (char) {
          case "\n":
          case "\r":
          case "\u0004": // Ctrl+D
            finish();
            resolve(input);
            return;
          case "\u0003": // Ctrl+C
            finish();
            reject(new Error("Cancelled"));
            return;
          case "\u007F": // Backspace
            if (input.length > 0) {
              input = input.slice(0, -1);
              output.write("\b \b");
            }
            break;
          default:
            input += char;
            output.write("*");
        }
      }
    };

    stdin.on("data", onData);
  });
}

export function askHidden(
  question: string,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<string> {
  const { input, output } = streams;
  if (input instanceof ReadStream && input.isTTY) {
    return askRaw(question, input, output);
  }
  return askLine(question, streams);
}
