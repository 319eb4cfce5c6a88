// Type definitions shared across the grading pipeline

/**
 * Result status stored on a student record
 */
export enum BuildStatus {
  PENDING = 'Pending',
  PROCESSING = 'Processing',
  SUCCESS = 'Success',
  WARNING = 'Warning',
  FAILED = 'Failed',
  ERROR = 'Error'
}

/**
 * Lifecycle of one grading run
 */
export enum RunState {
  IDLE = 'Idle',
  RUNNING = 'Running',
  COMPLETED = 'Completed',
  STOPPED_BY_USER = 'StoppedByUser',
  FAILED = 'Failed'
}

export type PackageManager = 'npm' | 'yarn' | 'pnpm';

/**
 * A roster row. Identity fields are fixed after load, result fields are written by the pipeline.
 */
export interface StudentRecord {
  readonly name: string;
  readonly studentId?: string;
  readonly email?: string;
  readonly repositoryUrl: string;
  // set when the roster row lacks what grading needs; such records are never cloned
  readonly invalidReason?: string;
  buildStatus: BuildStatus;
  grade: number | null;
  feedback: string;
  buildErrors: string;
  processedAt: string; // LocaleString, empty until processed
}

export interface StudentResultUpdate {
  buildStatus: BuildStatus;
  grade: number;
  feedback: string;
  buildErrors: string;
}

export interface SummaryStats {
  total: number;
  processed: number;
  success: number;
  warning: number;
  failed: number;
  errors: number;
  averageGrade: number;
  minGrade: number;
  maxGrade: number;
}

// Workspace

export type CloneFailureReason = 'not-found' | 'permission-denied' | 'timeout' | 'transport';

export type AcquireResult =
  | { ok: true; workspacePath: string }
  | { ok: false; reason: CloneFailureReason; message: string; workspacePath: string };

/**
 * Structural facts about a checked-out project
 */
export interface ProjectInfo {
  hasManifest: boolean;
  hasFrameworkDependency: boolean;
  frameworkVersion?: string;
  packageManager: PackageManager;
  hasSrcFolder: boolean;
  hasPublicFolder: boolean;
  hasReadme: boolean;
  hasBuildScript: boolean;
  startScript?: 'start' | 'dev';
  projectName?: string;
  dependencies: Record<string, string>;
  devDependencies: Record<string, string>;
  scripts: Record<string, string>;
}

export interface InspectResult {
  valid: boolean;
  message: string;
  info: ProjectInfo;
}

export interface RepositoryDescription {
  fileCount: number;
  totalSize: number;
  lastCommit?: {
    hash: string;
    author: string;
    date: string;
    message: string;
  };
}

// Toolchain

export type ToolchainFailure = 'timeout' | 'exit-code' | 'spawn-error' | 'missing-directory';

export interface ToolchainResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
  failure?: ToolchainFailure;
  durationMs: number;
}

export interface BuildErrorAnalysis {
  dependencyErrors: string[];
  typeErrors: string[];
  lintWarnings: string[];
  syntaxErrors: string[];
  suggestions: string[];
}

export interface BuildOutputAnalysis {
  outputDir: string | null;
  exists: boolean;
  fileCount: number;
  totalSize: number;
  hasIndexHtml: boolean;
  hasJsFiles: boolean;
  hasCssFiles: boolean;
  warnings: string[];
  errors: string[];
}

export interface BuildResult {
  success: boolean;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  warnings: string[];
  errors: string[];
  output: BuildOutputAnalysis;
}

// Functional tests

export interface FunctionalTestResult {
  appLoads: boolean;
  contentRenders: boolean;
  buttonsWork: boolean;
  navigationWorks: boolean;
  formsWork: boolean;
  functionalityScore: number;
  testDetails: string[];
  errors: string[];
  strategy?: string;
}

// Requirements

export interface RequirementSection {
  name: string;
  requirements: string[];
  points: number;
}

export interface RequirementSpec {
  sections: RequirementSection[];
}

export interface SectionEvaluation {
  name: string;
  points: number;
  scorePercentage: number;
  earnedPoints: number;
  met: string[];
  missed: string[];
}

export interface EvaluationResult {
  fileStructureScore: number;
  codeQualityScore: number;
  buildScore: number;
  e2eFunctionalityScore: number;
  requirementsScore: number;
  totalScore: number;
  detailedAnalysis: string[];
  requirementsMet: string[];
  requirementsFailed: string[];
  sections: SectionEvaluation[];
}

export interface GradeOutcome {
  grade: number;
  feedback: string;
}

// Batching

export interface BatchRange {
  readonly start: number; // inclusive
  readonly end: number; // exclusive
}

export interface BatchPlan {
  readonly total: number;
  readonly batchSize: number;
  readonly batches: ReadonlyArray<BatchRange>;
}

// Collaborators

export interface RosterStore {
  loadRoster(source: string): Promise<StudentRecord[]>;
  getRecords(): readonly StudentRecord[];
  getValidationWarnings(): readonly string[];
  markProcessing(index: number): void;
  recordResult(index: number, update: StudentResultUpdate): void;
  getSummaryStats(): SummaryStats;
}

export interface RequirementsSource {
  load(source: string): Promise<void>;
  getRequirementSections(): Map<string, string[]>;
  getPointWeights(): Map<string, number>;
}

export interface ProgressSink {
  onProgress(studentName: string, statusLabel: string, studentIndex: number, success?: boolean): void;
}
