import readline from "node:readline";

// readline writes echoed keystrokes through this internal hook; replacing it masks the input.
type MaskableInterface = readline.Interface & {
  _writeToOutput?: (chunk: string) => void;
};

export type PromptFn = (question: string) => Promise<string>;

/**
 * What to echo for a readline output chunk while `question` is on screen.
 * readline redraws the whole line as `question + input` after edits, so only
 * the question prefix stays readable.
 */
export function maskEcho(chunk: string, question: string): string {
  if (chunk === "\n" || chunk === "\r\n") return chunk;
  if (chunk.startsWith(question)) {
    return `${question}${"*".repeat(chunk.length - question.length)}`;
  }
  return "*".repeat(chunk.length);
}

export function isTerminalInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

/**
 * Asks for a secret, echoing `*` per character. Resolves to "" when the
 * terminal is not interactive so callers fall back to their default.
 */
export const promptHidden: PromptFn = async (question) => {
  if (!isTerminalInteractive()) return "";
  return await new Promise((resolve) => {
    const rl: MaskableInterface = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: true
    });
    const write = rl._writeToOutput;
    rl._writeToOutput = (chunk: string) => {
      process.stdout.write(maskEcho(chunk, question));
    };
    rl.question(question, (answer) => {
      rl._writeToOutput = write;
      rl.close();
      resolve(answer);
    });
  });
};
