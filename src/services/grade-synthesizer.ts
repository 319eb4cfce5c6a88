import { config } from '../config';
import type { GradingMode } from '../config';
import { logger } from '../utils/logger';
import { BANDS } from './requirements-evaluator';
import type { BuildResult, EvaluationResult, GradeOutcome } from '../types';

export interface GradingScale {
  buildSuccess: number;
  buildWithWarnings: number;
  buildFailure: number;
}

export const BASIC_FEEDBACK = {
  clean: 'Excellent! Project builds successfully without errors or warnings.',
  warnings: 'Project builds successfully but with warnings. Consider addressing the warnings for better code quality.',
  failed: 'Project failed to build. Please fix the compilation errors and ensure all dependencies are properly configured.',
  timedOut: 'Project build did not finish within the time limit. Check for build steps that hang or run too long.'
};

/**
 * Closing remark chosen by grade threshold
 */
export function gradeRemark(grade: number): string {
  if (grade >= 90) {
    return 'Excellent work! Your project meets all requirements with high quality implementation.';
  }
  if (grade >= 75) {
    return 'Good work! Your project meets most requirements with some areas for improvement.';
  }
  if (grade >= 60) {
    return 'Satisfactory work. Your project meets basic requirements but needs significant improvements.';
  }
  return 'Your project needs substantial work to meet the assignment requirements.';
}

function buildStatusLines(build: BuildResult): string[] {
  if (build.success) {
    return ['Build Status: Successful'];
  }
  const lines = [build.timedOut ? 'Build Status: Did not finish (timed out)' : 'Build Status: Failed'];
  if (build.stderr.trim()) {
    lines.push(`Build Errors: ${build.stderr.trim().slice(0, 200)}...`);
  }
  return lines;
}

/**
 * Turns build outcomes and evaluation results into a grade and feedback
 */
export class GradeSynthesizer {
  constructor(
    readonly scale: GradingScale = config.gradingScale,
    private readonly mode: GradingMode = config.gradingMode
  ) {}

  /**
   * Three-step grade from the build outcome alone
   */
  basicGrade(build: Pick<BuildResult, 'success' | 'warnings' | 'timedOut'>): GradeOutcome {
    if (!build.success) {
      return {
        grade: this.scale.buildFailure,
        feedback: build.timedOut ? BASIC_FEEDBACK.timedOut : BASIC_FEEDBACK.failed
      };
    }
    if (build.warnings.length > 0) {
      return { grade: this.scale.buildWithWarnings, feedback: BASIC_FEEDBACK.warnings };
    }
    return { grade: this.scale.buildSuccess, feedback: BASIC_FEEDBACK.clean };
  }

  /**
   * Grade equal to the evaluation total, with a full breakdown as feedback
   */
  compositeGrade(studentName: string, build: BuildResult, evaluation: EvaluationResult): GradeOutcome {
    const grade = Math.max(0, Math.min(100, Math.round(evaluation.totalScore)));
    const lines = [
      `Comprehensive Evaluation Report for ${studentName}`,
      `Final Grade: ${grade}/100`,
      '',
      'Evaluation Breakdown:',
      ...evaluation.detailedAnalysis.map(point => `  • ${point}`),
      '',
      'Component Scores:',
      `  • File Structure: ${evaluation.fileStructureScore}/${BANDS.fileStructure} points`,
      `  • Code Quality: ${evaluation.codeQualityScore}/${BANDS.codeQuality} points`,
      `  • Build & Basic Functionality: ${evaluation.buildScore}/${BANDS.build} points`,
      `  • End-to-End Functionality: ${evaluation.e2eFunctionalityScore}/${BANDS.e2e} points`,
      `  • Requirements Matching: ${evaluation.requirementsScore}/${BANDS.requirements} points`,
      '',
      ...buildStatusLines(build),
      `Requirements Met: ${evaluation.requirementsMet.length}`,
      `Requirements Not Met: ${evaluation.requirementsFailed.length}`,
      '',
      gradeRemark(grade)
    ];
    return { grade, feedback: lines.join('\n') };
  }

  /**
   * Older grading path: the grade is the weighted share of section points earned.
   * Without sections it falls back to build quality alone.
   */
  sectionWeightedGrade(studentName: string, build: BuildResult, evaluation: EvaluationResult): GradeOutcome {
    const earned = evaluation.sections.reduce((sum, section) => sum + section.earnedPoints, 0);
    const possible = evaluation.sections.reduce((sum, section) => sum + section.points, 0);
    const grade = possible > 0 ? Math.min(100, Math.floor((earned / possible) * 100)) : this.buildQuality(build);

    const lines = [`Section-Weighted Evaluation for ${studentName}`, `Final Grade: ${grade}/100`, ''];
    for (const section of evaluation.sections) {
      lines.push(`${section.name}: ${section.earnedPoints}/${section.points} points (${section.scorePercentage}%)`);
      lines.push(...section.missed.map(requirement => `  - Missing: ${requirement}`));
    }
    if (evaluation.sections.length === 0) {
      lines.push(`Build quality: ${grade}/100`);
    }
    lines.push('', ...buildStatusLines(build), '', gradeRemark(grade));
    return { grade, feedback: lines.join('\n') };
  }

  /**
   * 0 for a failed build, 60 with output errors, 85 with warnings, 100 clean
   */
  buildQuality(build: BuildResult): number {
    if (!build.success) return 0;
    if (build.errors.length > 0) return 60;
    if (build.warnings.length > 0) return 85;
    return 100;
  }

  /**
   * Selects the grading variant: basic without requirements, otherwise the configured mode
   */
  grade(studentName: string, build: BuildResult, evaluation: EvaluationResult, hasRequirements: boolean): GradeOutcome {
    if (!hasRequirements) {
      logger.debug(`Basic grading for ${studentName}`);
      return this.basicGrade(build);
    }
    if (this.mode === 'section-weighted') {
      logger.debug(`Section-weighted grading for ${studentName}`);
      return this.sectionWeightedGrade(studentName, build, evaluation);
    }
    logger.debug(`Composite grading for ${studentName}`);
    return this.compositeGrade(studentName, build, evaluation);
  }
}
