// src/cli/utils/output.ts
import chalk from 'chalk';
import Table from 'cli-table3';

/** 青色表头的表格输出 */
export function printTable(headers: string[], rows: string[][]): void {
  const table = new Table({
    head: headers.map((h) => chalk.cyan(h)),
    style: { head: [], border: [] },
  });
  rows.forEach((row) => table.push(row));
  console.log(table.toString());
}

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

/** 错误输出到 stderr */
export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.log(chalk.yellow('⚠'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/** 容量状态着色：FULL 为红色，其余为绿色 */
export function formatFillStatus(status: string): string {
  return status === 'FULL' ? chalk.red(status) : chalk.green(status);
}
