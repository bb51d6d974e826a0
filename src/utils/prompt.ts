import readline from "readline";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/**
 * Ask a yes/no question. On the process's own streams it answers no without
 * asking when no terminal is attached; input that ends unanswered is a no.
 */
export async function confirm(question: string, streams?: PromptStreams): Promise<boolean> {
  if (!streams && !isInteractive()) {
    return false;
  }
  const {input, output} = streams ?? {input: process.stdin, output: process.stdout};
  const rl = readline.createInterface({input, output, terminal: false});

  return new Promise((resolve) => {
    let answered = false;
    rl.on("close", () => {
      if (!answered) {
        resolve(false);
      }
    });
    rl.question(`${question} (y/N): `, (answer) => {
      answered = true;
      rl.close();
      resolve(isYes(answer));
    });
  });
}
