import * as fs from 'fs';
import * as path from 'path';
import * as xlsx from 'xlsx';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { BuildStatus } from '../types';
import type { RosterStore, StudentRecord, StudentResultUpdate, SummaryStats } from '../types';

export const ROSTER_COLUMNS = {
  name: 'Name',
  repositoryUrl: 'GitHubRepoURL',
  studentId: 'StudentID',
  email: 'Email'
} as const;

export const RESULT_COLUMNS = {
  buildStatus: 'BuildStatus',
  grade: 'Grade',
  feedback: 'Feedback',
  processedAt: 'ProcessedAt',
  buildErrors: 'BuildErrors'
} as const;

export const RESULTS_SHEET = 'Grading Results';

// Excel rejects cells longer than 32767 characters
const MAX_CELL_LENGTH = 32000;

const cell = z.union([z.string(), z.number()]).transform(value => String(value).trim());

const rowSchema = z.object({
  [ROSTER_COLUMNS.name]: cell.pipe(z.string().min(1, 'Name is empty')),
  [ROSTER_COLUMNS.repositoryUrl]: cell.pipe(z.string().min(1, 'repository URL is empty')),
  [ROSTER_COLUMNS.studentId]: cell.optional(),
  [ROSTER_COLUMNS.email]: cell.optional()
});

type RosterRow = Record<string, unknown>;

const GITHUB_PREFIXES = ['https://github.com/', 'http://github.com/', 'https://www.github.com/', 'github.com/'];
const GITHUB_SSH_URL = /^git@github\.com:[^/\s]+\/[^/\s]+$/;

/**
 * True when the URL names an owner and a repository on GitHub, over https or ssh
 */
export function isGitHubRepositoryUrl(url: string): boolean {
  const lower = url.trim().toLowerCase();
  if (GITHUB_SSH_URL.test(lower)) {
    return true;
  }
  const prefix = GITHUB_PREFIXES.find(candidate => lower.startsWith(candidate));
  if (!prefix) {
    return false;
  }
  const [owner, repo] = lower.slice(prefix.length).replace(/^\/+|\/+$/g, '').split('/');
  return Boolean(owner) && Boolean(repo);
}

function textCell(value: unknown): string {
  return typeof value === 'string' || typeof value === 'number' ? String(value).trim() : '';
}

/**
 * Non-fatal problems in a loaded roster, in the order they are reported
 */
export function validateRoster(records: readonly StudentRecord[]): string[] {
  const warnings: string[] = [];
  // sheet rows are 1-based and the header takes the first
  const sheetRow = (i: number) => i + 2;

  const emptyNames = records.flatMap((record, i) => (record.name ? [] : [sheetRow(i)]));
  if (emptyNames.length > 0) {
    warnings.push(`Column '${ROSTER_COLUMNS.name}' has empty values in rows: ${emptyNames.join(', ')}`);
  }
  const emptyUrls = records.flatMap((record, i) => (record.repositoryUrl ? [] : [sheetRow(i)]));
  if (emptyUrls.length > 0) {
    warnings.push(`Column '${ROSTER_COLUMNS.repositoryUrl}' has empty values in rows: ${emptyUrls.join(', ')}`);
  }

  const invalidUrls = records.flatMap((record, i) =>
    record.repositoryUrl && !isGitHubRepositoryUrl(record.repositoryUrl) ? [`Row ${sheetRow(i)}: ${record.repositoryUrl}`] : []
  );
  if (invalidUrls.length > 0) {
    warnings.push(`Invalid GitHub URLs found: ${invalidUrls.join(', ')}`);
  }

  const seen = new Map<string, number>();
  for (const record of records) {
    if (record.name) {
      seen.set(record.name, (seen.get(record.name) ?? 0) + 1);
    }
  }
  const duplicates = [...seen].filter(([, count]) => count > 1).map(([name]) => name);
  if (duplicates.length > 0) {
    warnings.push(`Duplicate student names found: ${duplicates.join(', ')}`);
  }
  return warnings;
}

function clip(text: string): string {
  return text.length > MAX_CELL_LENGTH ? `${text.slice(0, MAX_CELL_LENGTH)}...` : text;
}

/**
 * Student roster backed by an .xlsx workbook. Unknown columns are carried through to the saved file.
 * Every sheet row becomes a record; a row missing its name or repository is recorded as an error.
 */
export class ExcelRosterStore implements RosterStore {
  private records: StudentRecord[] = [];
  private rows: RosterRow[] = [];
  private warnings: string[] = [];

  async loadRoster(source: string): Promise<StudentRecord[]> {
    const workbook = xlsx.readFile(source);
    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheet) {
      throw new Error(`No worksheet found in ${source}`);
    }

    const header = xlsx.utils.sheet_to_json<unknown[]>(sheet, { header: 1 })[0] ?? [];
    const missing = [ROSTER_COLUMNS.name, ROSTER_COLUMNS.repositoryUrl].filter(column => !header.includes(column));
    if (missing.length > 0) {
      throw new Error(`Missing required columns: ${missing.join(', ')}`);
    }

    const rows = xlsx.utils.sheet_to_json<RosterRow>(sheet, { defval: '' });
    this.rows = [];
    this.records = [];
    this.warnings = [];
    rows.forEach((row, i) => {
      this.rows.push(row);
      const parsed = rowSchema.safeParse(row);
      if (!parsed.success) {
        const problem = parsed.error.issues.map(issue => issue.message).join('; ');
        logger.warn(`Roster row ${i + 2} cannot be graded: ${problem}`);
        this.records.push({
          name: textCell(row[ROSTER_COLUMNS.name]),
          repositoryUrl: textCell(row[ROSTER_COLUMNS.repositoryUrl]),
          studentId: textCell(row[ROSTER_COLUMNS.studentId]) || undefined,
          email: textCell(row[ROSTER_COLUMNS.email]) || undefined,
          invalidReason: problem,
          buildStatus: BuildStatus.ERROR,
          grade: 0,
          feedback: `Invalid roster row: ${problem}`,
          buildErrors: problem,
          processedAt: ''
        });
        return;
      }
      const data = parsed.data;
      this.records.push({
        name: data[ROSTER_COLUMNS.name],
        repositoryUrl: data[ROSTER_COLUMNS.repositoryUrl],
        studentId: data[ROSTER_COLUMNS.studentId] || undefined,
        email: data[ROSTER_COLUMNS.email] || undefined,
        buildStatus: BuildStatus.PENDING,
        grade: null,
        feedback: '',
        buildErrors: '',
        processedAt: ''
      });
    });

    this.warnings = validateRoster(this.records);
    for (const warning of this.warnings) {
      logger.warn(warning);
    }
    logger.info(`Loaded ${this.records.length} student records from ${source}`);
    return this.getRecords().slice();
  }

  getRecords(): readonly StudentRecord[] {
    return this.records;
  }

  getValidationWarnings(): readonly string[] {
    return this.warnings;
  }

  markProcessing(index: number): void {
    const record = this.records[index];
    if (record) {
      record.buildStatus = BuildStatus.PROCESSING;
    }
  }

  recordResult(index: number, update: StudentResultUpdate): void {
    const record = this.records[index];
    if (!record) {
      throw new Error(`No student record at index ${index}`);
    }
    record.buildStatus = update.buildStatus;
    record.grade = update.grade;
    record.feedback = update.feedback;
    record.buildErrors = update.buildErrors;
    record.processedAt = new Date().toLocaleString();
  }

  getSummaryStats(): SummaryStats {
    const processed = this.records.filter(
      record => record.buildStatus !== BuildStatus.PENDING && record.buildStatus !== BuildStatus.PROCESSING
    );
    const grades = processed.map(record => record.grade ?? 0);
    const count = (status: BuildStatus) => this.records.filter(record => record.buildStatus === status).length;
    return {
      total: this.records.length,
      processed: processed.length,
      success: count(BuildStatus.SUCCESS),
      warning: count(BuildStatus.WARNING),
      failed: count(BuildStatus.FAILED),
      errors: count(BuildStatus.ERROR),
      averageGrade: grades.length > 0 ? Math.round((grades.reduce((a, b) => a + b, 0) / grades.length) * 100) / 100 : 0,
      minGrade: grades.length > 0 ? Math.min(...grades) : 0,
      maxGrade: grades.length > 0 ? Math.max(...grades) : 0
    };
  }

  /**
   * Writes the roster with result columns to a new workbook
   */
  save(outputPath: string): string {
    const rows: RosterRow[] = this.records.map((record, i) => ({
      ...this.rows[i],
      [RESULT_COLUMNS.buildStatus]: record.buildStatus,
      [RESULT_COLUMNS.grade]: record.grade ?? '',
      [RESULT_COLUMNS.feedback]: clip(record.feedback),
      [RESULT_COLUMNS.processedAt]: record.processedAt,
      [RESULT_COLUMNS.buildErrors]: clip(record.buildErrors)
    }));

    const sheet = xlsx.utils.json_to_sheet(rows);
    const columns = rows.length > 0 ? Object.keys(rows[0] ?? {}) : [];
    sheet['!cols'] = columns.map(column => ({
      wch: Math.min(50, Math.max(column.length, ...rows.map(row => String(row[column] ?? '').length)) + 2)
    }));

    const workbook = xlsx.utils.book_new();
    xlsx.utils.book_append_sheet(workbook, sheet, RESULTS_SHEET);
    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    xlsx.writeFile(workbook, outputPath);
    logger.info(`Results saved to ${outputPath}`);
    return outputPath;
  }

  /**
   * Writes a plain-text log of every failed or errored student that has build errors.
   * Returns the path written.
   */
  exportErrorLog(outputPath: string): string {
    const failures = this.records.filter(
      record =>
        (record.buildStatus === BuildStatus.FAILED || record.buildStatus === BuildStatus.ERROR) && record.buildErrors !== ''
    );
    const divider = '-'.repeat(80);
    const lines = [
      'Assignment Grading Error Log',
      `Generated: ${new Date().toLocaleString()}`,
      `Total Failed/Error Records: ${failures.length}`,
      '='.repeat(80),
      ''
    ];
    for (const record of failures) {
      lines.push(
        `Student: ${record.name}`,
        `GitHub URL: ${record.repositoryUrl}`,
        `Status: ${record.buildStatus}`,
        `Grade: ${record.grade ?? ''}`,
        `Processed At: ${record.processedAt}`,
        `Feedback: ${record.feedback}`,
        'Build Errors:',
        record.buildErrors,
        divider,
        ''
      );
    }

    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    fs.writeFileSync(outputPath, lines.join('\n'), 'utf-8');
    logger.info(`Error log exported to ${outputPath}`);
    return outputPath;
  }
}
