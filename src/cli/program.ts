/**
 * CLI for the compute pricing scraper
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { config } from '../config/index.js';
import type { ScrapedPricing } from '../contracts/catalog.contract.js';
import { sortPricingFile, updatePricingFile } from '../catalog/update.js';
import { scrapeEc2Pricing, type ScrapeProgress } from '../scraper.js';

type ScrapeCommandOptions = {
    pricingFile: string;
    dryRun?: boolean;
};

function describeProgress(progress: ScrapeProgress): string {
    if (progress.stage === 'legacy') {
        return `Fetching legacy pricing [${progress.index + 1}/${progress.total}] ${progress.url}`;
    }
    return `Fetching ${progress.os} pricing for ${progress.region} [${progress.index + 1}/${progress.total}]`;
}

async function fetchPricing(): Promise<ScrapedPricing> {
    const spinner = ora('Fetching pricing data...').start();
    try {
        const scraped = await scrapeEc2Pricing({
            onProgress: (progress) => {
                spinner.text = describeProgress(progress);
            },
        });
        spinner.succeed('Fetched pricing data');
        return scraped;
    } catch (error) {
        spinner.fail('Fetching pricing data failed');
        throw error;
    }
}

async function runScrape(options: ScrapeCommandOptions): Promise<void> {
    console.log(chalk.cyan('Scraping EC2 pricing data (this may take up to 2 minutes)....'));

    const scraped = await fetchPricing();
    const result = await updatePricingFile(options.pricingFile, scraped, { dryRun: options.dryRun });

    if (options.dryRun) {
        console.log(
            result.changed
                ? chalk.yellow('Pricing data would be updated (dry run)')
                : chalk.green('Pricing data is up to date')
        );
        return;
    }

    console.log(chalk.green('Pricing data updated'));
}

async function runSort(filePath: string): Promise<void> {
    const { written } = await sortPricingFile(filePath);
    console.log(written ? chalk.green(`Sorted ${filePath}`) : chalk.green(`${filePath} is already sorted`));
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('compute-pricing-scraper')
        .description('Scrape EC2 on-demand pricing and merge it into the pricing catalog')
        .version('1.0.0')
        .allowExcessArguments(false)
        .option('-f, --pricing-file <path>', 'pricing catalog to update', config.catalog.filePath)
        .option('--dry-run', 'scrape and report whether the catalog would change, without writing it')
        .action(async (options: ScrapeCommandOptions) => {
            await runScrape(options);
        });

    program
        .command('sort')
        .description('Re-sort an existing pricing catalog without scraping')
        .argument('[file]', 'pricing catalog to sort (defaults to --pricing-file)')
        .action(async (file: string | undefined) => {
            await runSort(file ?? program.opts<ScrapeCommandOptions>().pricingFile);
        });

    return program;
}
