import { Args, Command } from '@oclif/core';
import { scrapeDetails } from '../scraper.js';
import { loadDetailUrls } from '../utils/url-loader.js';
import { browserFlags, executeStage, outputFlags, resumeFlags } from './scrape-options.js';

/**
 * Scrapes institution detail pages in checkpointed batches.
 */
export default class Details extends Command {
  static override args = {
    inputFile: Args.string({
      description: 'File listing detail URLs (.json rankings output, .csv or .txt)',
      required: true,
    }),
  };

  static override description =
    'Scrapes institution detail pages listed in a file. Each batch is checkpointed; use --skipProcessed to resume.';

  static override examples = [
    '<%= config.bin %> <%= command.id %> output/rankings-20250301-142501.json',
    '<%= config.bin %> <%= command.id %> urls.txt --batchSize 25 --skipProcessed',
  ];

  static override flags = {
    ...outputFlags,
    ...browserFlags,
    ...resumeFlags,
  };

  public async run(): Promise<void> {
    const { args, flags } = await this.parse(Details);
    await executeStage(this, 'Detail scrape', flags, async (context) => {
      const urls = await loadDetailUrls(args.inputFile, context.logger);
      const run = await scrapeDetails(context, urls, {
        skipProcessed: flags.skipProcessed,
        checkpointDir: flags.checkpointDir,
        limit: flags.limit,
      });
      this.log(
        `${run.summary.successful}/${run.summary.total} detail pages extracted (${run.skipped} skipped): ${run.outputFile}`
      );
    });
  }
}
