import * as fs from 'fs';
import * as path from 'path';
import * as xlsx from 'xlsx';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GradeSynthesizer, BASIC_FEEDBACK } from '../src/services/grade-synthesizer';
import { PipelineController } from '../src/services/pipeline';
import type { PipelineDependencies } from '../src/services/pipeline';
import { ProgressChannel } from '../src/services/progress-channel';
import type { ProgressEvent } from '../src/services/progress-channel';
import { DocumentRequirementsSource } from '../src/services/requirements-source';
import { ExcelRosterStore } from '../src/services/roster-store';
import type { Toolchain } from '../src/services/toolchain-runner';
import { GitWorkspaceManager } from '../src/services/workspace-manager';
import { BuildStatus, RunState } from '../src/types';
import type { ProgressSink, ToolchainResult } from '../src/types';
import { REACT_MANIFEST, makeTempDir, manifest, removeDir, writeFiles } from './helpers';

const SCALE = { buildSuccess: 100, buildWithWarnings: 50, buildFailure: 0 };

const APP_SOURCE = "import React from 'react';\nexport default function App() { return <h1>Todo</h1>; }";

const REPOSITORIES: Record<string, Record<string, string>> = {
  'https://example.test/ana.git': { 'package.json': REACT_MANIFEST, 'src/App.js': APP_SOURCE },
  'https://example.test/cy.git': { 'package.json': REACT_MANIFEST, 'src/App.js': APP_SOURCE, BUILD_FAILS: '' },
  'https://example.test/dee.git': { 'package.json': manifest({ dependencies: { vue: '^3.4.0' } }) },
  'https://example.test/eli.git': { 'package.json': REACT_MANIFEST, INSTALL_FAILS: '' },
  'https://example.test/fay.git': { 'package.json': REACT_MANIFEST, INSTALL_THROWS: '' }
};

class FixtureWorkspaces extends GitWorkspaceManager {
  protected async fetchRepository(repoUrl: string, target: string): Promise<void> {
    const files = REPOSITORIES[repoUrl];
    if (!files) {
      throw new Error('remote: Repository not found.');
    }
    writeFiles(target, files);
  }
}

function result(overrides: Partial<ToolchainResult> = {}): ToolchainResult {
  return { ok: true, stdout: '', stderr: '', exitCode: 0, durationMs: 1, ...overrides };
}

/**
 * Behaves according to marker files in the workspace
 */
class MarkerToolchain implements Toolchain {
  readonly installed: string[] = [];

  async install(projectPath: string): Promise<ToolchainResult> {
    this.installed.push(path.basename(projectPath));
    if (fs.existsSync(path.join(projectPath, 'INSTALL_THROWS'))) {
      throw new Error('disk full');
    }
    if (fs.existsSync(path.join(projectPath, 'INSTALL_FAILS'))) {
      return result({ ok: false, exitCode: 1, failure: 'exit-code', stdout: 'x', stderr: 'npm ERR! 404' });
    }
    return result();
  }

  async build(projectPath: string): Promise<ToolchainResult> {
    if (fs.existsSync(path.join(projectPath, 'BUILD_FAILS'))) {
      return result({ ok: false, exitCode: 1, failure: 'exit-code', stderr: "Module not found: Error: Can't resolve 'axios'" });
    }
    writeFiles(projectPath, {
      'build/index.html': '<div id="root"></div>',
      'build/static/js/main.js': 'render()',
      'build/static/css/main.css': 'body{}'
    });
    return result();
  }
}

function writeRoster(file: string, students: Array<[string, string]>): void {
  const workbook = xlsx.utils.book_new();
  const rows = [['Name', 'GitHubRepoURL'], ...students];
  xlsx.utils.book_append_sheet(workbook, xlsx.utils.aoa_to_sheet(rows), 'Students');
  xlsx.writeFile(workbook, file);
}

async function drain(channel: ProgressChannel): Promise<ProgressEvent[]> {
  const events: ProgressEvent[] = [];
  for await (const event of channel) {
    events.push(event);
  }
  return events;
}

describe('PipelineController', () => {
  let dir: string;
  let rosterPath: string;
  let roster: ExcelRosterStore;
  let workspaces: FixtureWorkspaces;
  let toolchain: MarkerToolchain;

  function controller(overrides: Partial<PipelineDependencies> = {}): PipelineController {
    return new PipelineController(
      {
        roster,
        workspaces,
        toolchain,
        functionalTester: null,
        synthesizer: new GradeSynthesizer(SCALE, 'composite'),
        ...overrides
      },
      { cleanupAfterProcessing: true, fixedBatchSize: 50 }
    );
  }

  beforeEach(() => {
    dir = makeTempDir();
    rosterPath = path.join(dir, 'students.xlsx');
    roster = new ExcelRosterStore();
    workspaces = new FixtureWorkspaces({ reposDir: path.join(dir, 'repos'), retryDelay: 1 });
    toolchain = new MarkerToolchain();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('grades each student and records failures without stopping', async () => {
    writeRoster(rosterPath, [
      ['Ana Lima', 'https://example.test/ana.git'],
      ['Ben Park', 'https://example.test/missing.git'],
      ['Cy Diaz', 'https://example.test/cy.git']
    ]);
    const progress = new ProgressChannel();
    const pipeline = controller({ progress });
    await expect(pipeline.loadInputs(rosterPath)).resolves.toMatchObject({ ok: true, message: 'Loaded 3 student records' });

    const reading = drain(progress);
    const outcome = await pipeline.startRun();
    progress.close();
    const events = await reading;

    expect(outcome).toEqual({
      ok: true,
      state: RunState.COMPLETED,
      message: 'Processing completed: 2 successful, 1 failed out of 3 students',
      succeeded: 2,
      failed: 1
    });

    const [ana, ben, cy] = roster.getRecords();
    expect(ana).toMatchObject({ buildStatus: BuildStatus.SUCCESS, grade: 100, feedback: BASIC_FEEDBACK.clean, buildErrors: '' });
    expect(ben).toMatchObject({
      buildStatus: BuildStatus.ERROR,
      grade: 0,
      feedback: 'Repository clone failed: Repository not found (may be private or deleted)',
      buildErrors: 'Repository not found (may be private or deleted)'
    });
    expect(cy).toMatchObject({
      buildStatus: BuildStatus.FAILED,
      grade: 0,
      feedback: BASIC_FEEDBACK.failed,
      buildErrors:
        "Build stderr: Module not found: Error: Can't resolve 'axios'\nBuild stdout: \n" +
        'Suggestions: Run npm install to ensure all dependencies are installed'
    });

    // a failed clone never reaches install
    expect(toolchain.installed).toEqual(['1-ana_lima', '3-cy_diaz']);

    expect(events.filter(event => event.studentIndex === 0).map(event => event.statusLabel)).toEqual([
      'Starting processing',
      'Cloning repository',
      'Verifying React project',
      'Installing dependencies',
      'Building project',
      'Analyzing build results',
      'Evaluating requirements',
      'Completed - Success'
    ]);
    expect(events.filter(event => event.success !== undefined).map(event => [event.studentName, event.success])).toEqual([
      ['Ana Lima', true],
      ['Ben Park', false],
      ['Cy Diaz', false]
    ]);

    expect(pipeline.getSummaryStats()).toMatchObject({ processed: 3, success: 1, failed: 1, errors: 1, averageGrade: 33.33 });
    expect(fs.readdirSync(workspaces.reposDir)).toEqual([]);
    expect(pipeline.getRunStatus()).toEqual({ isRunning: false, stopRequested: false, state: RunState.COMPLETED });
  });

  it('records invalid projects and install problems per student', async () => {
    writeRoster(rosterPath, [
      ['Dee Ito', 'https://example.test/dee.git'],
      ['Eli Moss', 'https://example.test/eli.git'],
      ['Fay Ng', 'https://example.test/fay.git'],
      ['Ana Lima', 'https://example.test/ana.git']
    ]);
    const pipeline = controller();
    await pipeline.loadInputs(rosterPath);
    const outcome = await pipeline.startRun();

    expect(outcome.message).toBe('Processing completed: 1 successful, 3 failed out of 4 students');
    const [dee, eli, fay, ana] = roster.getRecords();
    expect(dee).toMatchObject({
      buildStatus: BuildStatus.ERROR,
      grade: 0,
      feedback: 'Invalid React project: React dependency not found in package.json'
    });
    expect(eli).toMatchObject({
      buildStatus: BuildStatus.FAILED,
      grade: 0,
      feedback: 'Dependency installation failed. Check package.json and dependencies.',
      buildErrors: 'Install stdout: x\nInstall stderr: npm ERR! 404'
    });
    expect(fay).toMatchObject({
      buildStatus: BuildStatus.ERROR,
      grade: 0,
      feedback: 'Processing error: disk full',
      buildErrors: 'System error: disk full'
    });
    expect(ana?.buildStatus).toBe(BuildStatus.SUCCESS);
  });

  it('records roster rows without a repository as errors without cloning them', async () => {
    writeRoster(rosterPath, [
      ['Gus Roy', ''],
      ['Ana Lima', 'https://example.test/ana.git']
    ]);
    const pipeline = controller();
    await expect(pipeline.loadInputs(rosterPath)).resolves.toEqual({
      ok: true,
      message: 'Loaded 2 student records',
      warnings: [
        "Column 'GitHubRepoURL' has empty values in rows: 2",
        'Invalid GitHub URLs found: Row 3: https://example.test/ana.git'
      ]
    });
    const outcome = await pipeline.startRun();

    expect(outcome.message).toBe('Processing completed: 1 successful, 1 failed out of 2 students');
    expect(toolchain.installed).toEqual(['2-ana_lima']);
    const [gus, ana] = roster.getRecords();
    expect(gus).toMatchObject({
      name: 'Gus Roy',
      buildStatus: BuildStatus.ERROR,
      grade: 0,
      feedback: 'Invalid roster row: repository URL is empty',
      buildErrors: 'repository URL is empty'
    });
    expect(gus?.processedAt).not.toBe('');
    expect(ana?.buildStatus).toBe(BuildStatus.SUCCESS);
  });

  it('stops before the next student when asked', async () => {
    writeRoster(rosterPath, [
      ['Ana Lima', 'https://example.test/ana.git'],
      ['Cy Diaz', 'https://example.test/cy.git'],
      ['Ben Park', 'https://example.test/missing.git']
    ]);
    let pipeline: PipelineController | undefined;
    const stopAfterFirst: ProgressSink = {
      onProgress(_name, label, index) {
        if (index === 0 && label.startsWith('Completed')) {
          pipeline?.requestStop();
        }
      }
    };
    pipeline = controller({ progress: stopAfterFirst });
    await pipeline.loadInputs(rosterPath);
    const outcome = await pipeline.startRun();

    expect(outcome).toEqual({
      ok: true,
      state: RunState.STOPPED_BY_USER,
      message: 'Processing stopped by user: 1 successful, 0 failed out of 1 students',
      succeeded: 1,
      failed: 0
    });
    expect(roster.getRecords().map(record => record.buildStatus)).toEqual([
      BuildStatus.SUCCESS,
      BuildStatus.PENDING,
      BuildStatus.PENDING
    ]);
    expect(pipeline.getRunStatus().stopRequested).toBe(true);
  });

  it('limits the run in test mode', async () => {
    writeRoster(rosterPath, [
      ['Ana Lima', 'https://example.test/ana.git'],
      ['Cy Diaz', 'https://example.test/cy.git']
    ]);
    const pipeline = controller();
    await pipeline.loadInputs(rosterPath);
    const outcome = await pipeline.startRun({ testModeLimit: 1 });
    expect(outcome.succeeded + outcome.failed).toBe(1);
    expect(roster.getRecords()[1]?.buildStatus).toBe(BuildStatus.PENDING);
  });

  it('refuses to start twice or without students', async () => {
    const empty = controller();
    await expect(empty.startRun()).resolves.toMatchObject({ ok: false, message: 'No student data loaded' });

    writeRoster(rosterPath, [['Ana Lima', 'https://example.test/ana.git']]);
    const pipeline = controller();
    await pipeline.loadInputs(rosterPath);
    const first = pipeline.startRun();
    await expect(pipeline.startRun()).resolves.toMatchObject({ ok: false, message: 'Processing is already in progress' });
    await expect(first).resolves.toMatchObject({ ok: true, state: RunState.COMPLETED });
  });

  it('reports input problems', async () => {
    writeRoster(rosterPath, [['Ana Lima', 'https://example.test/ana.git']]);
    const pipeline = controller();
    await expect(pipeline.loadInputs(rosterPath, path.join(dir, 'requirements.md'))).resolves.toMatchObject({
      ok: false,
      message: 'No requirements reader configured'
    });

    const missing = await pipeline.loadInputs(path.join(dir, 'missing.xlsx'));
    expect(missing.ok).toBe(false);
    expect(missing.message.startsWith('Failed to load inputs: ')).toBe(true);
  });

  it('grades against loaded requirements with the composite report', async () => {
    writeRoster(rosterPath, [['Ana Lima', 'https://example.test/ana.git']]);
    const requirementsPath = path.join(dir, 'requirements.md');
    fs.writeFileSync(requirementsPath, 'Technical Requirements (40 points):\n- Create an App component\n- Use react-router-dom');
    const pipeline = controller({ requirements: new DocumentRequirementsSource() });

    await expect(pipeline.loadInputs(rosterPath, requirementsPath)).resolves.toMatchObject({
      ok: true,
      message: 'Loaded 1 student records and 2 requirements in 1 sections'
    });
    await pipeline.startRun();

    const ana = roster.getRecords()[0];
    expect(ana?.buildStatus).toBe(BuildStatus.SUCCESS);
    expect(ana?.feedback.split('\n').slice(0, 2)).toEqual([
      'Comprehensive Evaluation Report for Ana Lima',
      `Final Grade: ${ana?.grade}/100`
    ]);
    expect(ana?.feedback).toContain('Requirements Met: 1');
    expect(ana?.feedback).toContain('Requirements Not Met: 1');
  });
});
