import { config } from '../config';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/tools';
import { BuildStatus, RunState } from '../types';
import type {
  BatchPlan,
  BuildResult,
  FunctionalTestResult,
  ProgressSink,
  RequirementSpec,
  RequirementsSource,
  RosterStore,
  StudentRecord,
  StudentResultUpdate,
  SummaryStats
} from '../types';
import { planBatches } from './batch-planner';
import { BuildOutputAnalyzer } from './build-output-analyzer';
import type { FunctionalTester } from './functional-tester';
import { GradeSynthesizer } from './grade-synthesizer';
import { RequirementsEvaluator, allRequirements } from './requirements-evaluator';
import { toRequirementSpec } from './requirements-source';
import { analyzeBuildErrors } from './toolchain-runner';
import type { Toolchain } from './toolchain-runner';
import type { Workspaces } from './workspace-manager';

export interface PipelineDependencies {
  roster: RosterStore;
  requirements?: RequirementsSource;
  workspaces: Workspaces;
  toolchain: Toolchain;
  outputAnalyzer?: BuildOutputAnalyzer;
  functionalTester?: FunctionalTester | null;
  evaluator?: RequirementsEvaluator;
  synthesizer?: GradeSynthesizer;
  progress?: ProgressSink;
}

export interface PipelineOptions {
  cleanupAfterProcessing?: boolean;
  fixedBatchSize?: number;
}

export interface StartRunOptions {
  maxBatchWidth?: number;
  testModeLimit?: number;
  dynamicBatching?: boolean;
}

export interface RunOutcome {
  ok: boolean;
  state: RunState;
  message: string;
  succeeded: number;
  failed: number;
}

export interface LoadInputsResult {
  ok: boolean;
  message: string;
  // roster problems that do not stop a run
  warnings: string[];
}

export interface RunStatus {
  isRunning: boolean;
  stopRequested: boolean;
  state: RunState;
}

/**
 * Everything one run needs, fixed when the run starts
 */
interface RunContext {
  readonly id: number;
  readonly abort: AbortController;
  readonly plan: BatchPlan;
  readonly records: readonly StudentRecord[];
  readonly requirementSpec?: RequirementSpec;
  readonly requirements: string[];
}

export const PROGRESS_LABELS = {
  starting: 'Starting processing',
  cloning: 'Cloning repository',
  verifying: 'Verifying React project',
  installing: 'Installing dependencies',
  building: 'Building project',
  analyzing: 'Analyzing build results',
  testing: 'Running functional tests',
  evaluating: 'Evaluating requirements',
  error: 'Error occurred'
} as const;

/**
 * Grades every student on the roster: clone, verify, install, build, analyze, test, evaluate, grade, record.
 * Students run one at a time; a failure is recorded against that student and the run moves on.
 */
export class PipelineController {
  private readonly outputAnalyzer: BuildOutputAnalyzer;
  private readonly evaluator: RequirementsEvaluator;
  private readonly synthesizer: GradeSynthesizer;
  private readonly cleanupAfterProcessing: boolean;
  private readonly fixedBatchSize: number;
  private requirementSpec?: RequirementSpec;
  private context?: RunContext;
  private runCounter = 0;
  private state: RunState = RunState.IDLE;

  constructor(private readonly deps: PipelineDependencies, options: PipelineOptions = {}) {
    this.outputAnalyzer = deps.outputAnalyzer ?? new BuildOutputAnalyzer();
    this.evaluator = deps.evaluator ?? new RequirementsEvaluator();
    this.synthesizer = deps.synthesizer ?? new GradeSynthesizer();
    this.cleanupAfterProcessing = options.cleanupAfterProcessing ?? config.cleanupAfterProcessing;
    this.fixedBatchSize = options.fixedBatchSize ?? config.batching.fixedBatchSize;
  }

  /**
   * Loads the roster and, when given, the requirements document
   */
  async loadInputs(rosterSource: string, requirementsSource?: string): Promise<LoadInputsResult> {
    try {
      const records = await this.deps.roster.loadRoster(rosterSource);
      const warnings = [...this.deps.roster.getValidationWarnings()];
      let message = `Loaded ${records.length} student records`;
      this.requirementSpec = undefined;

      if (requirementsSource) {
        if (!this.deps.requirements) {
          return { ok: false, message: 'No requirements reader configured', warnings };
        }
        await this.deps.requirements.load(requirementsSource);
        this.requirementSpec = toRequirementSpec(this.deps.requirements);
        const count = allRequirements(this.requirementSpec).length;
        message += ` and ${count} requirements in ${this.requirementSpec.sections.length} sections`;
      }

      logger.info(message);
      return { ok: true, message, warnings };
    } catch (error) {
      logger.error(`Failed to load inputs: ${error}`);
      return { ok: false, message: `Failed to load inputs: ${errorMessage(error)}`, warnings: [] };
    }
  }

  async startRun(options: StartRunOptions = {}): Promise<RunOutcome> {
    if (this.state === RunState.RUNNING) {
      return { ok: false, state: this.state, message: 'Processing is already in progress', succeeded: 0, failed: 0 };
    }
    const allRecords = this.deps.roster.getRecords();
    if (allRecords.length === 0) {
      return { ok: false, state: this.state, message: 'No student data loaded', succeeded: 0, failed: 0 };
    }

    const limit = options.testModeLimit;
    const records = limit !== undefined && limit > 0 ? allRecords.slice(0, limit) : allRecords;
    if (records.length < allRecords.length) {
      logger.info(`Test mode: processing only the first ${records.length} students`);
    }

    const plan = planBatches(records.length, {
      dynamic: options.dynamicBatching ?? true,
      fixedBatchSize: this.fixedBatchSize,
      maxBatchWidth: options.maxBatchWidth
    });
    const context: RunContext = {
      id: ++this.runCounter,
      abort: new AbortController(),
      plan,
      records,
      requirementSpec: this.requirementSpec,
      requirements: allRequirements(this.requirementSpec)
    };
    this.context = context;
    this.state = RunState.RUNNING;
    logger.info(`Run ${context.id}: ${plan.total} students in ${plan.batches.length} batches of up to ${plan.batchSize}`);

    let succeeded = 0;
    let failed = 0;
    try {
      for (const [batchIndex, batch] of plan.batches.entries()) {
        if (context.abort.signal.aborted) {
          break;
        }
        logger.info(`Processing batch ${batchIndex + 1}/${plan.batches.length} (students ${batch.start + 1}-${batch.end})`);

        for (let index = batch.start; index < batch.end; index++) {
          if (context.abort.signal.aborted) {
            break;
          }
          if (await this.processStudent(context, index)) {
            succeeded++;
          } else {
            failed++;
          }
        }

        if (batchIndex < plan.batches.length - 1) {
          logger.info(`Cleaning up workspaces after batch ${batchIndex + 1}`);
          await this.deps.workspaces.releaseAll();
        }
      }
    } catch (error) {
      this.state = RunState.FAILED;
      logger.error(`Error during processing: ${error}`);
      return { ok: false, state: this.state, message: `Processing failed: ${errorMessage(error)}`, succeeded, failed };
    }

    const stopped = context.abort.signal.aborted;
    this.state = stopped ? RunState.STOPPED_BY_USER : RunState.COMPLETED;
    const counts = `${succeeded} successful, ${failed} failed out of ${succeeded + failed} students`;
    const message = stopped ? `Processing stopped by user: ${counts}` : `Processing completed: ${counts}`;
    logger.info(message);
    return { ok: true, state: this.state, message, succeeded, failed };
  }

  /**
   * Asks the current run to stop before the next student
   */
  requestStop(): void {
    if (this.context && this.state === RunState.RUNNING) {
      logger.info('Processing stop requested');
      this.context.abort.abort();
    }
  }

  getRunStatus(): RunStatus {
    return {
      isRunning: this.state === RunState.RUNNING,
      stopRequested: this.context?.abort.signal.aborted ?? false,
      state: this.state
    };
  }

  async cleanupAll(): Promise<{ cleaned: number; errors: number }> {
    try {
      return await this.deps.workspaces.releaseAll();
    } catch (error) {
      logger.error(`Error during cleanup: ${error}`);
      return { cleaned: 0, errors: 1 };
    }
  }

  getSummaryStats(): SummaryStats {
    return this.deps.roster.getSummaryStats();
  }

  private emit(studentName: string, label: string, index: number, success?: boolean): void {
    try {
      this.deps.progress?.onProgress(studentName, label, index, success);
    } catch (error) {
      logger.error(`Progress sink error: ${error}`);
    }
  }

  private record(index: number, update: StudentResultUpdate): void {
    this.deps.roster.recordResult(index, update);
  }

  /**
   * Runs the whole pipeline for one student. Returns false when the student could not be graded.
   */
  private async processStudent(context: RunContext, index: number): Promise<boolean> {
    const student = context.records[index];
    if (!student) {
      return false;
    }
    const name = student.name;
    const emit = (label: string, success?: boolean) => this.emit(name, label, index, success);
    const failureGrade = this.synthesizer.scale.buildFailure;

    emit(PROGRESS_LABELS.starting);
    if (student.invalidReason !== undefined) {
      this.record(index, {
        buildStatus: BuildStatus.ERROR,
        grade: 0,
        feedback: `Invalid roster row: ${student.invalidReason}`,
        buildErrors: student.invalidReason
      });
      emit(`Completed - ${BuildStatus.ERROR}`, false);
      return false;
    }
    this.deps.roster.markProcessing(index);
    let workspacePath: string | undefined;

    try {
      emit(PROGRESS_LABELS.cloning);
      const acquired = await this.deps.workspaces.acquire(student.repositoryUrl, `${index + 1}-${name}`);
      if (!acquired.ok) {
        this.record(index, {
          buildStatus: BuildStatus.ERROR,
          grade: 0,
          feedback: `Repository clone failed: ${acquired.message}`,
          buildErrors: acquired.message
        });
        emit(`Completed - ${BuildStatus.ERROR}`, false);
        return false;
      }
      workspacePath = acquired.workspacePath;

      emit(PROGRESS_LABELS.verifying);
      const inspection = this.deps.workspaces.inspect(workspacePath);
      if (!inspection.valid) {
        this.record(index, {
          buildStatus: BuildStatus.ERROR,
          grade: 0,
          feedback: `Invalid React project: ${inspection.message}`,
          buildErrors: inspection.message
        });
        emit(`Completed - ${BuildStatus.ERROR}`, false);
        return false;
      }
      const projectInfo = inspection.info;

      emit(PROGRESS_LABELS.installing);
      const install = await this.deps.toolchain.install(workspacePath, projectInfo.packageManager);
      if (!install.ok) {
        this.record(index, {
          buildStatus: BuildStatus.FAILED,
          grade: failureGrade,
          feedback: install.failure === 'timeout'
            ? 'Dependency installation did not finish within the time limit.'
            : 'Dependency installation failed. Check package.json and dependencies.',
          buildErrors: `Install stdout: ${install.stdout}\nInstall stderr: ${install.stderr}`
        });
        emit(`Completed - ${BuildStatus.FAILED}`, false);
        return false;
      }

      emit(PROGRESS_LABELS.building);
      const build = await this.deps.toolchain.build(workspacePath, projectInfo.packageManager);

      emit(PROGRESS_LABELS.analyzing);
      const output = this.outputAnalyzer.analyze(workspacePath);
      const buildResult: BuildResult = {
        success: build.ok,
        timedOut: build.failure === 'timeout',
        stdout: build.stdout,
        stderr: build.stderr,
        // a successful build whose output looks wrong still deserves a warning
        warnings: build.ok ? [...output.warnings, ...output.errors] : output.warnings,
        errors: output.errors,
        output
      };

      let functional: FunctionalTestResult | null = null;
      if (this.deps.functionalTester) {
        emit(PROGRESS_LABELS.testing);
        try {
          functional = await this.deps.functionalTester.run(workspacePath, projectInfo, context.requirements);
        } catch (error) {
          logger.error(`Functional tests crashed for ${name}: ${error}`);
        }
      }

      emit(PROGRESS_LABELS.evaluating);
      const evaluation = this.evaluator.evaluate(
        workspacePath,
        projectInfo,
        build.ok,
        functional,
        context.requirementSpec
      );
      const { grade, feedback } = this.synthesizer.grade(name, buildResult, evaluation, context.requirements.length > 0);

      let status = BuildStatus.FAILED;
      if (build.ok) {
        status = buildResult.warnings.length > 0 ? BuildStatus.WARNING : BuildStatus.SUCCESS;
      }

      let buildErrors = '';
      if (!build.ok) {
        const analysis = analyzeBuildErrors(build.stderr, build.stdout);
        buildErrors = `Build stderr: ${build.stderr}\nBuild stdout: ${build.stdout}`;
        if (analysis.suggestions.length > 0) {
          buildErrors += `\nSuggestions: ${analysis.suggestions.join('; ')}`;
        }
      }

      this.record(index, { buildStatus: status, grade, feedback, buildErrors });
      logger.info(`Processed ${name}: grade ${grade}, status ${status}`);
      emit(`Completed - ${status}`, build.ok);
      return true;
    } catch (error) {
      logger.error(`Unexpected error processing ${name} (student ${index + 1} of ${context.records.length}): ${error}`);
      emit(PROGRESS_LABELS.error, false);
      this.record(index, {
        buildStatus: BuildStatus.ERROR,
        grade: 0,
        feedback: `Processing error: ${errorMessage(error)}`,
        buildErrors: `System error: ${errorMessage(error)}`
      });
      return false;
    } finally {
      if (workspacePath && this.cleanupAfterProcessing) {
        await this.deps.workspaces.release(workspacePath);
      }
    }
  }
}
