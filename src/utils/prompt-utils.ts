import * as readline from 'readline';
import chalk from 'chalk';

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Prompt user for yes/no confirmation
 */
export async function confirm(question: string, defaultYes = true): Promise<boolean> {
  const suffix = defaultYes ? '[Y/n]' : '[y/N]';
  const input = (await ask(`${question} ${suffix}: `)).toLowerCase();

  if (input === '') {
    return defaultYes;
  }
  return input === 'y' || input === 'yes';
}

/**
 * Ask the user to type a word (e.g. 'yes') before something destructive
 */
export async function confirmTyped(word = 'yes'): Promise<boolean> {
  const answer = await ask(chalk.yellow(`   Type '${word}' to confirm: `));
  return answer.toLowerCase() === word.toLowerCase();
}
