#!/usr/bin/env node
import 'dotenv/config';
import * as path from 'path';
import { config } from './src/config';
import { logger } from './src/utils/logger';
import { formatDateTime } from './src/utils/tools';
import { ExcelRosterStore } from './src/services/roster-store';
import { DocumentRequirementsSource } from './src/services/requirements-source';
import { GitWorkspaceManager } from './src/services/workspace-manager';
import { ToolchainRunner, verifyEnvironment } from './src/services/toolchain-runner';
import { FunctionalTestRunner } from './src/services/functional-tester';
import { PipelineController } from './src/services/pipeline';
import { ProgressChannel } from './src/services/progress-channel';

// Number of students graded with --test-mode
const TEST_MODE_STUDENTS = 2;

// Initialize services
const roster = new ExcelRosterStore();
const requirements = new DocumentRequirementsSource();
const workspaces = new GitWorkspaceManager();
const toolchain = new ToolchainRunner();
const progress = new ProgressChannel();
const controller = new PipelineController({
  roster,
  requirements,
  workspaces,
  toolchain,
  functionalTester: config.functionalTests.enabled ? new FunctionalTestRunner({ toolchain }) : null,
  progress
});

function parseArgs(argv: string[]): { rosterPath: string; requirementsPath: string; testMode: boolean } {
  const positional = argv.filter(arg => !arg.startsWith('--'));
  return {
    rosterPath: positional[0] || config.rosterPath,
    requirementsPath: positional[1] || config.requirementsPath,
    testMode: argv.includes('--test-mode')
  };
}

async function reportProgress(total: number): Promise<void> {
  let completed = 0;
  for await (const event of progress) {
    if (event.success !== undefined) {
      completed++;
      const percent = Math.round((completed / total) * 100);
      logger.info(`Progress: ${percent}% (${completed}/${total}) ${event.studentName}: ${event.statusLabel}`);
    } else {
      logger.debug(`[${event.studentIndex + 1}] ${event.studentName}: ${event.statusLabel}`);
    }
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.rosterPath) {
    logger.error('Usage: react-assignment-grader <students.xlsx> [requirements.docx] [--test-mode]');
    process.exitCode = 1;
    return;
  }

  logger.info('Starting React assignment grading');
  const environment = await verifyEnvironment();
  if (!environment.ok) {
    logger.error(environment.message);
    process.exitCode = 1;
    return;
  }
  logger.info(environment.message);

  const loaded = await controller.loadInputs(args.rosterPath, args.requirementsPath || undefined);
  if (!loaded.ok) {
    logger.error(loaded.message);
    process.exitCode = 1;
    return;
  }
  for (const warning of loaded.warnings) {
    logger.warn(`Roster: ${warning}`);
  }
  if (args.requirementsPath) {
    logger.info(`Requirements:\n${requirements.summary()}`);
  }

  process.once('SIGINT', () => {
    logger.warn('Interrupt received, stopping after the current student');
    controller.requestStop();
  });

  const testModeLimit = args.testMode ? TEST_MODE_STUDENTS : config.batching.testModeLimit;
  const total = testModeLimit ? Math.min(testModeLimit, roster.getRecords().length) : roster.getRecords().length;
  const consumer = reportProgress(total);

  const outcome = await controller.startRun({
    maxBatchWidth: config.batching.maxBatchWidth,
    testModeLimit,
    dynamicBatching: config.batching.dynamic
  });
  progress.close();
  await consumer;
  logger.info(outcome.message);

  const timestamp = formatDateTime(new Date());
  roster.save(path.join(config.outputDir, `students_graded_${timestamp}.xlsx`));
  roster.exportErrorLog(path.join(config.logging.dir, `error_log_${timestamp}.txt`));

  const stats = controller.getSummaryStats();
  logger.info(
    `Summary: ${stats.processed}/${stats.total} processed, ${stats.success} success, ${stats.warning} warning, ` +
      `${stats.failed} failed, ${stats.errors} errors; grades avg ${stats.averageGrade}, min ${stats.minGrade}, max ${stats.maxGrade}`
  );

  if (config.cleanupAfterProcessing) {
    await controller.cleanupAll();
  }
  if (!outcome.ok) {
    process.exitCode = 1;
  }
}

// Run the application
main()
  .catch(error => {
    logger.error(`Uncaught error: ${error}`);
    process.exitCode = 1;
  })
  .finally(() => {
    logger.info('Exiting application');
    process.exit();
  });
