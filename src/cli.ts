#!/usr/bin/env node

import dotenv from 'dotenv';
import { existsSync } from 'fs';
import { parseArgs } from 'util';
import { APP_NAME, APP_VERSION } from './config/constants';
import { MissingApiKeyError, describeError } from './core/errors';
import {
  createPitchDeckAnalyzer,
  type CreateAnalyzerOptions,
  type PipelineOutcome,
  type RunSummary,
} from './pipeline/pitchDeckAnalyzer';
import { logger } from './utils/logger';

const HELP_TEXT = `
${APP_NAME} v${APP_VERSION}

Analyze a startup pitch deck and write an investment report in Markdown.

Usage: ${APP_NAME} <pitch-deck> [options]

Arguments:
  pitch-deck         Path to the pitch deck file (PDF, PPT, or PPTX)

Options:
  --output, -o       Output path for the analysis report (default: auto-generated)
  --api-key          OpenRouter API key (can also be set via OPENROUTER_API_KEY)
  --help, -h         Show help
  --version          Show version

Examples:
  ${APP_NAME} pitch_deck.pdf
  ${APP_NAME} presentation.pptx --output custom_report.md
  ${APP_NAME} deck.pdf --api-key your_openrouter_key
`;

const RULE = '='.repeat(50);

export interface CliAnalyzer {
  analyze(filePath: string, outputPath?: string): Promise<PipelineOutcome>;
}

export interface CliDeps {
  createAnalyzer?: (options: CreateAnalyzerOptions) => CliAnalyzer;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean' },
      output: { type: 'string', short: 'o' },
      'api-key': { type: 'string' },
    },
    allowPositionals: true,
  });
}

function printSummary(summary: RunSummary, reportPath: string, analysisSucceeded: boolean): void {
  console.log(`📊 Report saved to: ${reportPath}`);
  console.log('\n📋 Summary:');
  console.log(`   • File type: ${summary.fileType}`);
  console.log(`   • Content length: ${summary.contentLength.toLocaleString('en-US')} characters`);
  console.log(`   • Pages/Slides: ${summary.unitCount ?? 'Unknown'}`);
  console.log(`   • Links found: ${summary.linksFound}`);
  console.log(`   • Pages enriched: ${summary.pagesEnriched}`);
  console.log(`   • Images sent: ${summary.imagesSent}`);
  console.log(`   • AI Model: ${summary.modelUsed ?? 'Unknown'}`);
  console.log(`   • Analysis: ${analysisSucceeded ? '✅ Success' : '❌ Failed'}`);
}

/**
 * Run the command line and return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    logger.debug({ error }, 'Invalid command line arguments');
    console.error(`❌ Error: ${describeError(error)}`);
    console.error('Use --help for usage information.');
    return 1;
  }

  const { values, positionals } = parsed;

  if (values.help) {
    console.log(HELP_TEXT);
    return 0;
  }

  if (values.version) {
    console.log(`${APP_NAME} v${APP_VERSION}`);
    return 0;
  }

  const deckPath = positionals[0];
  if (!deckPath) {
    console.error('❌ Error: Missing path to the pitch deck file.');
    console.error('Use --help for usage information.');
    return 1;
  }

  if (!existsSync(deckPath)) {
    console.error(`❌ Error: File not found: ${deckPath}`);
    return 1;
  }

  const createAnalyzer = deps.createAnalyzer ?? createPitchDeckAnalyzer;
  let analyzer: CliAnalyzer;
  try {
    analyzer = createAnalyzer({ apiKey: values['api-key'] });
  } catch (error) {
    console.error(`❌ Error: ${describeError(error)}`);
    if (error instanceof MissingApiKeyError) {
      console.error('💡 Set your OpenRouter API key using:');
      console.error("   export OPENROUTER_API_KEY='your_key_here'");
      console.error('   or use --api-key argument');
    }
    return 1;
  }

  console.log(`🚀 Starting analysis of: ${deckPath}`);
  console.log(RULE);

  let outcome: PipelineOutcome;
  try {
    outcome = await analyzer.analyze(deckPath, values.output);
  } catch (error) {
    logger.error({ error: describeError(error) }, 'Analysis run failed');
    console.log(RULE);
    console.error(`❌ Error: ${describeError(error)}`);
    return 1;
  }

  console.log(RULE);

  switch (outcome.kind) {
    case 'completed':
      console.log('✅ Analysis completed successfully!');
      printSummary(outcome.summary, outcome.reportPath, true);
      return 0;

    case 'analysis_failed':
      console.error('❌ Analysis failed!');
      console.error(`Error: ${outcome.error}`);
      printSummary(outcome.summary, outcome.reportPath, false);
      return 1;

    case 'aborted':
      console.error('❌ Analysis failed!');
      console.error(`Error: ${outcome.error}`);
      return 1;
  }
}

async function main(): Promise<void> {
  dotenv.config();
  process.exitCode = await runCli(process.argv.slice(2));
}

if (require.main === module) {
  main().catch(error => {
    logger.error({ error }, 'CLI execution failed');
    console.error(`Fatal error: ${describeError(error)}`);
    process.exit(1);
  });
}
