import type { Command } from 'commander';

/**
 * Flags choosing where 1-minute bars come from
 */
export function addStoreOptions(cmd: Command): Command {
  return cmd
    .option('--store <kind>', 'Bar store: clickhouse, prometheus or csv', 'clickhouse')
    .option('--csv <files...>', 'histdata.com 1-minute CSV files (with --store csv)')
    .option('--csv-zone <zone>', 'Time zone of CSV timestamps', 'utc');
}
