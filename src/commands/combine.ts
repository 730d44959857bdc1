import { Args, Command } from '@oclif/core';
import { combineFiles } from '../scraper.js';
import { executeStage, outputFlags } from './scrape-options.js';

export default class Combine extends Command {
  static override args = {
    rankingsFile: Args.string({ description: 'Rankings JSON output', required: true }),
    detailsFile: Args.string({ description: 'Details JSON output', required: true }),
  };

  static override description =
    'Joins rank entries with detail records on the detail URL. Every rank entry is kept, in order.';

  static override examples = [
    '<%= config.bin %> <%= command.id %> output/rankings-20250301-142501.json output/details-20250301-150012.json',
  ];

  static override flags = outputFlags;

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Combine);
    await executeStage(this, 'Combine', flags, async (context) => {
      const run = await combineFiles(context, args.rankingsFile, args.detailsFile);
      this.log(`Combined ${run.records.length} records: ${run.outputFile}`);
    });
  }
}
