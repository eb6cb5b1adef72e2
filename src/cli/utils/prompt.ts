// src/cli/utils/prompt.ts
import * as readline from 'readline';

/**
 * 从标准输入读取一行
 * @param question 提示语
 */
export function promptLine(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}
