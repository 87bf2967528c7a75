import readline from "readline/promises";

export interface PromptIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

export interface KeyCheckInput {
  apiKey: string;
  place: string;
}

const STDIO: PromptIO = { input: process.stdin, output: process.stdout };

/**
 * Ask each question once, in order. Answers are trimmed. Questions left
 * unanswered when the input ends come back as "".
 */
export async function promptAll(
  questions: readonly string[],
  io: PromptIO = STDIO
): Promise<string[]> {
  const rl = readline.createInterface({ input: io.input, output: io.output });
  // the iterator queues lines piped in faster than the questions are asked
  const lines = rl[Symbol.asyncIterator]();
  try {
    const answers: string[] = [];
    let ended = false;
    for (const question of questions) {
      if (ended) {
        answers.push("");
        continue;
      }
      rl.setPrompt(question);
      rl.prompt();
      const next = await lines.next();
      ended = next.done === true;
      answers.push(next.done ? "" : next.value.trim());
    }
    return answers;
  } finally {
    rl.close();
  }
}

/** Prompt for the key and the place. Null, once the reason is written, when either is empty. */
export async function askForKeyCheck(
  io: PromptIO = STDIO,
  errors: NodeJS.WritableStream = process.stderr
): Promise<KeyCheckInput | null> {
  const [apiKey = "", place = ""] = await promptAll(
    ["Enter your Google Maps API key: ", "Enter place (address or lat,lng): "],
    io
  );
  if (!apiKey || !place) {
    errors.write("API key and place are required.\n");
    return null;
  }
  return { apiKey, place };
}
