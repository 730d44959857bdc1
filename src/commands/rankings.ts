import { Command } from '@oclif/core';
import { scrapeRankings } from '../scraper.js';
import { browserFlags, executeStage, outputFlags, rankingsFlags } from './scrape-options.js';

/**
 * Fetches the rankings listing and writes its rows as `rankings-<ts>.json`.
 */
export default class Rankings extends Command {
  static override description =
    'Scrapes the rankings table into rank entries (rank, name, country, detail URL and six scores).';

  static override examples = [
    '<%= config.bin %> <%= command.id %>',
    '<%= config.bin %> <%= command.id %> --year 2024 --view reputation --limit 100',
    '<%= config.bin %> <%= command.id %> --url "https://www.timeshighereducation.com/world-university-rankings/2025/world-ranking/results" --saveHtml',
  ];

  static override flags = {
    ...outputFlags,
    ...browserFlags,
    ...rankingsFlags,
  };

  public async run(): Promise<void> {
    const { flags } = await this.parse(Rankings);
    await executeStage(this, 'Rankings scrape', flags, async (context) => {
      const run = await scrapeRankings(context, {
        url: flags.url,
        year: flags.year,
        view: flags.view,
        limit: flags.limit,
        saveHtml: flags.saveHtml,
      });
      this.log(`Extracted ${run.entries.length} entries (${run.warnings.length} warnings): ${run.outputFile}`);
    });
  }
}
