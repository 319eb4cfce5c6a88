import * as fs from 'fs';
import * as path from 'path';
import * as xlsx from 'xlsx';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ExcelRosterStore, RESULTS_SHEET, isGitHubRepositoryUrl } from '../src/services/roster-store';
import { BuildStatus } from '../src/types';
import { makeTempDir, removeDir } from './helpers';

function writeWorkbook(file: string, rows: unknown[][]): void {
  const workbook = xlsx.utils.book_new();
  xlsx.utils.book_append_sheet(workbook, xlsx.utils.aoa_to_sheet(rows), 'Students');
  xlsx.writeFile(workbook, file);
}

describe('ExcelRosterStore', () => {
  let dir: string;
  let rosterPath: string;

  beforeEach(() => {
    dir = makeTempDir();
    rosterPath = path.join(dir, 'students.xlsx');
    writeWorkbook(rosterPath, [
      ['Name', 'GitHubRepoURL', 'StudentID', 'Email', 'Section'],
      ['Ana Lima', 'https://github.com/example/ana-todo', 1001, 'ana@example.test', 'A'],
      ['', 'https://github.com/example/blank', 1002, '', 'A'],
      ['Ben Park', 'https://github.com/example/ben-todo', '', '', 'B']
    ]);
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('loads every row and marks incomplete ones as errors', async () => {
    const store = new ExcelRosterStore();
    const records = await store.loadRoster(rosterPath);

    expect(records).toEqual([
      {
        name: 'Ana Lima',
        repositoryUrl: 'https://github.com/example/ana-todo',
        studentId: '1001',
        email: 'ana@example.test',
        buildStatus: BuildStatus.PENDING,
        grade: null,
        feedback: '',
        buildErrors: '',
        processedAt: ''
      },
      {
        name: '',
        repositoryUrl: 'https://github.com/example/blank',
        studentId: '1002',
        email: undefined,
        invalidReason: 'Name is empty',
        buildStatus: BuildStatus.ERROR,
        grade: 0,
        feedback: 'Invalid roster row: Name is empty',
        buildErrors: 'Name is empty',
        processedAt: ''
      },
      {
        name: 'Ben Park',
        repositoryUrl: 'https://github.com/example/ben-todo',
        studentId: undefined,
        email: undefined,
        buildStatus: BuildStatus.PENDING,
        grade: null,
        feedback: '',
        buildErrors: '',
        processedAt: ''
      }
    ]);
  });

  it('rejects a roster without the required columns', async () => {
    const badPath = path.join(dir, 'bad.xlsx');
    writeWorkbook(badPath, [['Name', 'Repo'], ['Ana', 'https://github.com/example/ana-todo']]);
    await expect(new ExcelRosterStore().loadRoster(badPath)).rejects.toThrow('Missing required columns: GitHubRepoURL');
  });

  it('records results and summarizes them', async () => {
    const store = new ExcelRosterStore();
    await store.loadRoster(rosterPath);

    store.markProcessing(0);
    expect(store.getRecords()[0]?.buildStatus).toBe(BuildStatus.PROCESSING);
    expect(store.getSummaryStats().processed).toBe(1);

    store.recordResult(0, { buildStatus: BuildStatus.SUCCESS, grade: 90, feedback: 'Great', buildErrors: '' });
    store.recordResult(2, { buildStatus: BuildStatus.FAILED, grade: 0, feedback: 'Broken', buildErrors: 'Build stderr: x' });

    expect(store.getRecords()[0]?.processedAt).not.toBe('');
    expect(store.getSummaryStats()).toEqual({
      total: 3,
      processed: 3,
      success: 1,
      warning: 0,
      failed: 1,
      errors: 1,
      averageGrade: 30,
      minGrade: 0,
      maxGrade: 90
    });
  });

  it('refuses results for an unknown index', async () => {
    const store = new ExcelRosterStore();
    await store.loadRoster(rosterPath);
    expect(() =>
      store.recordResult(5, { buildStatus: BuildStatus.ERROR, grade: 0, feedback: '', buildErrors: '' })
    ).toThrow('No student record at index 5');
  });

  it('counts unusable rows as processed errors before a run', async () => {
    const store = new ExcelRosterStore();
    await store.loadRoster(rosterPath);
    expect(store.getSummaryStats()).toMatchObject({
      total: 3,
      processed: 1,
      errors: 1,
      averageGrade: 0,
      minGrade: 0,
      maxGrade: 0
    });
  });

  it('saves original and result columns to a new workbook', async () => {
    const store = new ExcelRosterStore();
    await store.loadRoster(rosterPath);
    store.recordResult(0, { buildStatus: BuildStatus.SUCCESS, grade: 90, feedback: 'Great', buildErrors: '' });

    const outputPath = path.join(dir, 'results', 'graded.xlsx');
    expect(store.save(outputPath)).toBe(outputPath);

    const workbook = xlsx.readFile(outputPath);
    expect(workbook.SheetNames).toEqual([RESULTS_SHEET]);
    const sheet = workbook.Sheets[RESULTS_SHEET];
    expect(sheet).toBeDefined();
    if (!sheet) {
      return;
    }
    const header = xlsx.utils.sheet_to_json<unknown[]>(sheet, { header: 1 })[0];
    expect(header).toEqual([
      'Name', 'GitHubRepoURL', 'StudentID', 'Email', 'Section',
      'BuildStatus', 'Grade', 'Feedback', 'ProcessedAt', 'BuildErrors'
    ]);
    const rows = xlsx.utils.sheet_to_json<Record<string, unknown>>(sheet);
    expect(rows).toHaveLength(3);
    expect(rows[0]).toMatchObject({
      Name: 'Ana Lima',
      StudentID: 1001,
      Section: 'A',
      BuildStatus: 'Success',
      Grade: 90,
      Feedback: 'Great'
    });
    expect(rows[1]).toMatchObject({
      GitHubRepoURL: 'https://github.com/example/blank',
      StudentID: 1002,
      BuildStatus: 'Error',
      Grade: 0,
      Feedback: 'Invalid roster row: Name is empty'
    });
    expect(rows[2]).toMatchObject({ Name: 'Ben Park', Section: 'B', BuildStatus: 'Pending' });
  });

  it('warns about empty cells, foreign URLs and duplicate names', async () => {
    const store = new ExcelRosterStore();
    await store.loadRoster(rosterPath);
    expect(store.getValidationWarnings()).toEqual(["Column 'Name' has empty values in rows: 3"]);

    const messyPath = path.join(dir, 'messy.xlsx');
    writeWorkbook(messyPath, [
      ['Name', 'GitHubRepoURL'],
      ['Ana Lima', 'https://github.com/example/ana-todo'],
      ['Ana Lima', 'git@github.com:example/ana-2.git'],
      ['Ben Park', 'https://gitlab.com/example/ben'],
      ['Cy Diaz', ''],
      ['Dee Ito', 'github.com/example']
    ]);
    const records = await store.loadRoster(messyPath);
    expect(records).toHaveLength(5);
    expect(records[3]).toMatchObject({ name: 'Cy Diaz', buildStatus: BuildStatus.ERROR, invalidReason: 'repository URL is empty' });
    expect(store.getValidationWarnings()).toEqual([
      "Column 'GitHubRepoURL' has empty values in rows: 5",
      'Invalid GitHub URLs found: Row 4: https://gitlab.com/example/ben, Row 6: github.com/example',
      'Duplicate student names found: Ana Lima'
    ]);
  });

  it('recognizes GitHub repository URLs', () => {
    expect(isGitHubRepositoryUrl('https://github.com/example/todo')).toBe(true);
    expect(isGitHubRepositoryUrl('https://github.com/example/todo.git/')).toBe(true);
    expect(isGitHubRepositoryUrl('github.com/example/todo')).toBe(true);
    expect(isGitHubRepositoryUrl('git@github.com:example/todo.git')).toBe(true);
    expect(isGitHubRepositoryUrl('https://github.com/example')).toBe(false);
    expect(isGitHubRepositoryUrl('https://example.test/todo.git')).toBe(false);
  });

  it('exports failed and errored students with their build errors', async () => {
    const store = new ExcelRosterStore();
    await store.loadRoster(rosterPath);
    store.recordResult(0, { buildStatus: BuildStatus.SUCCESS, grade: 90, feedback: 'Great', buildErrors: '' });
    store.recordResult(2, { buildStatus: BuildStatus.FAILED, grade: 0, feedback: 'Broken', buildErrors: 'Build stderr: x' });

    const logPath = path.join(dir, 'logs', 'error_log.txt');
    expect(store.exportErrorLog(logPath)).toBe(logPath);

    const lines = fs.readFileSync(logPath, 'utf-8').split('\n');
    expect(lines[0]).toBe('Assignment Grading Error Log');
    expect(lines[2]).toBe('Total Failed/Error Records: 2');
    expect(lines.slice(5, 15)).toEqual([
      'Student: ',
      'GitHub URL: https://github.com/example/blank',
      'Status: Error',
      'Grade: 0',
      'Processed At: ',
      'Feedback: Invalid roster row: Name is empty',
      'Build Errors:',
      'Name is empty',
      '-'.repeat(80),
      ''
    ]);
    expect(lines[15]).toBe('Student: Ben Park');
    expect(lines[17]).toBe('Status: Failed');
    expect(lines[22]).toBe('Build stderr: x');
    expect(lines).not.toContain('Student: Ana Lima');
  });
});
