import readline from 'readline';

/**
 * Asks for the export folder on an interactive terminal.
 */
export async function promptForFolder(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = readline.createInterface({ input, output });
  try {
    const answer = await new Promise<string>(resolve =>
      rl.question('Folder containing the Confluence HTML export: ', resolve)
    );
    return answer.trim().replace(/^(["'])(.*)\1$/, '$2');
  } finally {
    rl.close();
  }
}
