import { Command } from '@oclif/core';
import { runFullPipeline } from '../scraper.js';
import {
  browserFlags,
  executeStage,
  outputFlags,
  rankingsFlags,
  resumeFlags,
} from './scrape-options.js';

/**
 * Rankings, then every ranked detail page, then the join.
 */
export default class Pipeline extends Command {
  static override description =
    'Runs the full pipeline: scrape rankings, scrape the linked detail pages, combine both.';

  static override examples = [
    '<%= config.bin %> <%= command.id %> --limit 50',
    '<%= config.bin %> <%= command.id %> --year 2024 --skipProcessed --no-headless',
  ];

  static override flags = {
    ...outputFlags,
    ...browserFlags,
    ...rankingsFlags,
    ...resumeFlags,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Pipeline);
    await executeStage(this, 'Pipeline', flags, async (context) => {
      const run = await runFullPipeline(context, {
        url: flags.url,
        year: flags.year,
        view: flags.view,
        limit: flags.limit,
        saveHtml: flags.saveHtml,
        skipProcessed: flags.skipProcessed,
        checkpointDir: flags.checkpointDir,
      });
      this.log(`Rankings: ${run.rankings.outputFile}`);
      this.log(`Details: ${run.details.outputFile}`);
      this.log(`Combined: ${run.combined.outputFile}`);
    });
  }
}
