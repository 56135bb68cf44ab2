import { createInterface } from 'readline';

export async function promptUser(question: string, defaultValue: string = ''): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const suffix = defaultValue ? ` [${defaultValue}]` : '';

  return new Promise((resolve) => {
    rl.question(`${question}${suffix}: `, (answer) => {
      rl.close();
      const trimmed = answer.trim();
      resolve(trimmed.length > 0 ? trimmed : defaultValue);
    });
  });
}

/**
 * Read a secret without echoing it. Falls back to a plain prompt when stdin is not a TTY.
 */
export async function promptSecret(question: string): Promise<string> {
  if (!process.stdin.isTTY) {
    return promptUser(question);
  }

  process.stdout.write(`${question}: `);
  process.stdin.setRawMode(true);
  process.stdin.resume();

  return new Promise((resolve, reject) => {
    let input = '';

    const finish = () => {
      process.stdin.setRawMode(false);
      process.stdin.pause();
      process.stdin.removeListener('data', onData);
      process.stdout.write('\n');
    };

    const onData = (chunk: Buffer) => {
      for (const c of chunk.toString()) {
        if (c === '\n' || c === '\r') {
          finish();
          resolve(input);
          return;
        }
        if (c === '\u0003') { // Ctrl+C
          finish();
          reject(new Error('Input cancelled'));
          return;
        }
        if (c === '\u007f') { // Backspace
          if (input.length > 0) {
            input = input.slice(0, -1);
            process.stdout.write('\b \b');
          }
        } else if (c >= ' ') {
          input += c;
          process.stdout.write('*');
        }
      }
    };

    process.stdin.on('data', onData);
  });
}

export async function promptConfirm(question: string, defaultValue: boolean = false): Promise<boolean> {
  const answer = await promptUser(`${question} (${defaultValue ? 'Y/n' : 'y/N'})`);

  if (answer.length === 0) {
    return defaultValue;
  }

  return answer.toLowerCase().startsWith('y');
}
