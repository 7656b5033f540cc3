import { createInterface } from 'readline/promises';

export async function promptUser(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

export async function promptWithDefault(question: string, defaultValue: string): Promise<string> {
  const answer = await promptUser(`${question} (${defaultValue}): `);
  return answer.length > 0 ? answer : defaultValue;
}

export async function promptConfirm(question: string, defaultValue: boolean = false): Promise<boolean> {
  const answer = await promptUser(`${question} (${defaultValue ? 'Y/n' : 'y/N'}): `);
  return answer.length === 0 ? defaultValue : answer.toLowerCase().startsWith('y');
}

export async function promptChoice<T>(
  question: string,
  choices: Array<{ label: string; value: T; description?: string }>,
  defaultIndex: number = 0
): Promise<T> {
  console.log(question);
  choices.forEach((choice, index) => {
    const marker = index === defaultIndex ? '●' : '○';
    const description = choice.description ? ` - ${choice.description}` : '';
    console.log(`  ${marker} ${index + 1}. ${choice.label}${description}`);
  });

  while (true) {
    const answer = await promptUser('Enter your choice (number): ');
    const index = answer === '' ? defaultIndex : Number.parseInt(answer, 10) - 1;
    const choice = choices[index];
    if (choice) {
      return choice.value;
    }
    console.log(`Please enter a number between 1 and ${choices.length}`);
  }
}

/**
 * Prompt without echoing the typed characters. Falls back to a plain prompt without a TTY.
 */
export async function promptSecure(question: string): Promise<string> {
  const stdin = process.stdin;
  if (!stdin.isTTY) {
    return promptUser(question);
  }

  process.stdout.write(question);
  stdin.setRawMode(true);
  stdin.resume();

  return new Promise(resolve => {
    let input = '';
    const finish = () => {
      stdin.setRawMode(false);
      stdin.pause();
      stdin.removeListener('data', onData);
      process.stdout.write('\n');
    };

    const onData = (data: Buffer) => {
      for (const c of data.toString()) {
        if (c === '\n' || c === '\r') {
          finish();
          resolve(input);
          return;
        }
        if (c === '\u0003') {
          finish();
          process.exit(130);
        }
        if (c === '\u007f') {
          if (input.length > 0) {
            input = input.slice(0, -1);
            process.stdout.write('\b \b');
          }
        } else if (c >= ' ' && c <= '~') {
          input += c;
          process.stdout.write('*');
        }
      }
    };

    stdin.on('data', onData);
  });
}
