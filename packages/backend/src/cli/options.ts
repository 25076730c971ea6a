/**
 * コマンドライン引数の定義と解析
 */
import { Command, InvalidArgumentError } from 'commander';

export interface CliOptions {
  channels?: string;
  skip?: string;
  types?: string;
  excludeTypes?: string;
  limitTop?: number;
  limitBottom?: number;
  maxInactiveDays?: number;
  verifyChannels: boolean;
  verifyCutoffDays: number;
  ignoreProgress: boolean;
  schedule?: string;
  serve: boolean;
}

/**
 * 正の整数オプションのパーサー
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('正の整数を指定してください');
  }
  return parsed;
}

export function buildProgram(): Command {
  return new Command()
    .name('harvest')
    .description('YouTube comment harvester with flexible channel selection')
    .option('--channels <names>', 'comma-separated channel names to include (keys of the source registry)')
    .option('--skip <names>', 'comma-separated channel names to exclude')
    .option('--types <tags>', 'include only channels whose tags contain ANY of these labels')
    .option('--exclude-types <tags>', 'exclude channels whose tags contain ANY of these labels')
    .option('--limit-top <n>', 'keep only the top-N channels by subscriber count', parsePositiveInt)
    .option('--limit-bottom <n>', 'keep only the bottom-N channels by subscriber count', parsePositiveInt)
    .option('--max-inactive-days <days>', 'skip channels whose last upload is older than DAYS', parsePositiveInt)
    .option('--verify-channels', 'print a health report for every selected channel and exit', false)
    .option('--verify-cutoff-days <n>', 'flag a channel inactive after N days without uploads', parsePositiveInt, 365)
    .option('--ignore-progress', 'ignore saved page cursors and start every video from the first page', false)
    .option('--schedule <cron>', 'run the harvest repeatedly on this cron schedule')
    .option('--serve', 'expose the status API while running', false);
}

/**
 * 引数を解析する
 * @param argv process.argv.slice(2) 相当
 */
export function parseCli(argv: string[], program: Command = buildProgram()): CliOptions {
  program.parse(argv, { from: 'user' });
  return program.opts<CliOptions>();
}
