// src/cli/migrate.commands.ts

import { describeFillStatus } from '@core/activity/policy/capacity.policy';
import { RESET_CONFIRMATION_TOKEN } from '@usecases/maintenance/reset-database.usecase';
import { Command, CommanderError } from 'commander';
import type { MaintenanceCommands } from './cli-context';
import {
  formatFillStatus,
  printError,
  printInfo,
  printSuccess,
  printTable,
  printWarning,
} from './utils/output';

/** 命令行依赖：上下文工厂与交互输入 */
export interface MigrateCliDeps {
  openContext: () => Promise<MaintenanceCommands>;
  prompt: (question: string) => Promise<string>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 打开上下文执行命令，结束后关闭
 * @returns 退出码：成功 0，失败 1
 */
async function withContext(
  deps: MigrateCliDeps,
  failureLabel: string,
  run: (ctx: MaintenanceCommands) => Promise<void>,
): Promise<number> {
  let ctx: MaintenanceCommands | null = null;
  try {
    ctx = await deps.openContext();
    await run(ctx);
    return 0;
  } catch (error) {
    printError(`${failureLabel}: ${describeError(error)}`);
    return 1;
  } finally {
    if (ctx) await ctx.close();
  }
}

async function runMigrate(ctx: MaintenanceCommands): Promise<void> {
  printInfo('Starting database migration...');
  const result = await ctx.migrate();
  if (result.backupPath) printSuccess(`Backup created: ${result.backupPath}`);
  if (result.outcome.kind === 'seeded') {
    const { activitiesCreated, usersCreated, enrollmentsCreated } = result.outcome.bootstrap;
    printInfo(
      `No existing data found, seeded ${activitiesCreated} activities, ${usersCreated} users, ${enrollmentsCreated} enrollments`,
    );
  } else if (result.outcome.healed > 0) {
    printInfo(`Updated ${result.outcome.healed} activities with missing timestamps`);
  }
  printSuccess('Database migration completed successfully!');
}

async function runHealth(ctx: MaintenanceCommands): Promise<void> {
  const report = await ctx.health();
  console.log('Database Health Report:');
  console.log(`   Activities: ${report.activities}`);
  console.log(`   Users: ${report.users}`);
  console.log(`   Total Enrollments: ${report.totalEnrollments}`);
  console.log('\nActivity Details:');
  printTable(
    ['Activity', 'Participants', 'Status'],
    report.details.map((detail) => [
      detail.name,
      `${detail.participants}/${detail.maxParticipants}`,
      formatFillStatus(describeFillStatus(detail.maxParticipants, detail.participants)),
    ]),
  );
}

/**
 * 解析并执行 migrate-db 命令
 * @param argv 用户参数（不含 node 与脚本路径）
 * @param deps 上下文工厂与交互输入
 * @returns 退出码
 */
export async function runMigrateCli(argv: string[], deps: MigrateCliDeps): Promise<number> {
  let exitCode = 0;

  const program = new Command();
  program
    .name('migrate-db')
    .description('Database maintenance for the Mergington activities backend')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => console.log(str.trimEnd()),
      writeErr: (str) => console.error(str.trimEnd()),
    });

  program
    .command('migrate')
    .description('Back up, apply schema updates, then seed or heal data')
    .action(async () => {
      exitCode = await withContext(deps, 'Migration failed', runMigrate);
    });

  program
    .command('reset')
    .description('Reset database (DANGER: removes all data)')
    .option('--confirm <token>', `confirmation token, must be exactly ${RESET_CONFIRMATION_TOKEN}`)
    .action(async (options: { confirm?: string }) => {
      printWarning('WARNING: This will delete ALL data!');
      const confirmation =
        options.confirm ?? (await deps.prompt(`Type '${RESET_CONFIRMATION_TOKEN}' to confirm: `));
      if (confirmation !== RESET_CONFIRMATION_TOKEN) {
        printError('Reset cancelled');
        exitCode = 1;
        return;
      }
      exitCode = await withContext(deps, 'Reset failed', async (ctx) => {
        const result = await ctx.reset(confirmation);
        if (result.backupPath) printInfo(`Backup created: ${result.backupPath}`);
        printSuccess('Database reset completed!');
      });
    });

  program
    .command('health')
    .description('Check database health and show statistics')
    .action(async () => {
      exitCode = await withContext(deps, 'Health check failed', runHealth);
    });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode === 0 ? 0 : 1;
    throw error;
  }
  return exitCode;
}
