export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

/** Whole of piped standard input; empty when stdin is a terminal. */
export async function readStdin(stream: NodeJS.ReadStream = process.stdin): Promise<string> {
  if (stream.isTTY) {
    return "";
  }
  stream.setEncoding("utf8");
  let data = "";
  for await (const chunk of stream) {
    data += typeof chunk === "string" ? chunk : String(chunk);
  }
  return data;
}
