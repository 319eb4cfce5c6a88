import { logger } from '../utils/logger';
import { errorMessage } from '../utils/tools';
import {
  hasComponentFile,
  hasConventionalFile,
  hasCssRule,
  hasDependency,
  hasDocumentation,
  hasViewportMeta,
  lacksDebugStatements,
  scoreBuildFunctionality,
  scoreCodeQuality,
  scoreFileStructure
} from './predicates';
import type {
  EvaluationResult,
  FunctionalTestResult,
  ProjectInfo,
  RequirementSection,
  RequirementSpec,
  SectionEvaluation
} from '../types';

export const BANDS = {
  fileStructure: 20,
  codeQuality: 20,
  build: 20,
  e2e: 25,
  requirements: 15
} as const;

export type SectionCategory = 'functional' | 'ui' | 'code-quality' | 'general';

/**
 * Picks the heuristic family for a section from its name
 */
export function categorizeSection(name: string): SectionCategory {
  const lower = name.toLowerCase();
  if (lower.includes('technical') || lower.includes('function')) {
    return 'functional';
  }
  if (/\bui\b/.test(lower) || lower.includes('design') || lower.includes('styl')) {
    return 'ui';
  }
  if (lower.includes('code') || lower.includes('quality')) {
    return 'code-quality';
  }
  return 'general';
}

type RequirementCheck = (requirement: string) => boolean;

function checkFor(category: SectionCategory, projectPath: string, projectInfo: ProjectInfo): RequirementCheck {
  switch (category) {
    case 'functional':
      return requirement =>
        hasComponentFile(projectPath, requirement) ||
        hasDependency(projectInfo, requirement) ||
        hasConventionalFile(projectPath, projectInfo, requirement);
    case 'ui':
      return requirement =>
        hasCssRule(projectPath, requirement) ||
        (/responsive|mobile|viewport/i.test(requirement) && hasViewportMeta(projectPath));
    case 'code-quality': {
      const clean = lacksDebugStatements(projectPath);
      return () => clean;
    }
    case 'general':
      return requirement =>
        hasConventionalFile(projectPath, projectInfo, requirement) ||
        hasComponentFile(projectPath, requirement) ||
        hasDependency(projectInfo, requirement) ||
        hasDocumentation(projectPath, requirement) ||
        hasCssRule(projectPath, requirement);
  }
}

/**
 * Flattened requirement list of a spec, in section order
 */
export function allRequirements(spec: RequirementSpec | undefined): string[] {
  return spec ? spec.sections.flatMap(section => section.requirements) : [];
}

/**
 * Rescales a 0-100 functionality score into the end-to-end band
 */
export function scaleFunctionalScore(result: FunctionalTestResult | null): number {
  if (!result) {
    return 0;
  }
  return Math.min(BANDS.e2e, Math.round((result.functionalityScore * BANDS.e2e) / 100));
}

function clampTotal(value: number): number {
  return Math.max(0, Math.min(100, Math.round(value)));
}

/**
 * Scores a workspace in five bands: file structure, code quality, build, end-to-end and requirements
 */
export class RequirementsEvaluator {
  evaluateSection(projectPath: string, projectInfo: ProjectInfo, section: RequirementSection): SectionEvaluation {
    const category = categorizeSection(section.name);
    const check = checkFor(category, projectPath, projectInfo);
    const met: string[] = [];
    const missed: string[] = [];
    for (const requirement of section.requirements) {
      (check(requirement) ? met : missed).push(requirement);
    }
    const scorePercentage = section.requirements.length > 0
      ? Math.floor((met.length / section.requirements.length) * 100)
      : 100;
    logger.debug(`Section '${section.name}' (${category}): ${met.length}/${section.requirements.length} met`);
    return {
      name: section.name,
      points: section.points,
      scorePercentage,
      earnedPoints: Math.floor((scorePercentage / 100) * section.points),
      met,
      missed
    };
  }

  evaluate(
    projectPath: string,
    projectInfo: ProjectInfo,
    buildSucceeded: boolean,
    functionalResult: FunctionalTestResult | null,
    requirementSpec?: RequirementSpec
  ): EvaluationResult {
    const requirements = allRequirements(requirementSpec);
    if (!requirementSpec || requirements.length === 0) {
      return this.basicEvaluation(projectInfo, buildSucceeded, functionalResult);
    }
    const sections = requirementSpec.sections;

    const result: EvaluationResult = {
      fileStructureScore: 0,
      codeQualityScore: 0,
      buildScore: 0,
      e2eFunctionalityScore: 0,
      requirementsScore: 0,
      totalScore: 0,
      detailedAnalysis: [],
      requirementsMet: [],
      requirementsFailed: [],
      sections: []
    };

    const band = (label: string, max: number, fallback: number, score: () => number): number => {
      try {
        const value = score();
        result.detailedAnalysis.push(`${label}: ${value}/${max} points`);
        return value;
      } catch (error) {
        logger.warn(`${label} evaluation failed: ${errorMessage(error)}`);
        result.detailedAnalysis.push(`${label}: ${fallback}/${max} points (evaluation error: ${errorMessage(error)})`);
        return fallback;
      }
    };

    result.fileStructureScore = band('File Structure', BANDS.fileStructure, 0, () => scoreFileStructure(projectPath));
    result.codeQualityScore = band('Code Quality', BANDS.codeQuality, 10, () => scoreCodeQuality(projectPath));
    result.buildScore = band('Build & Basic Functionality', BANDS.build, buildSucceeded ? 20 : 5, () =>
      scoreBuildFunctionality(projectPath, requirements, buildSucceeded)
    );

    result.e2eFunctionalityScore = scaleFunctionalScore(functionalResult);
    if (functionalResult) {
      result.detailedAnalysis.push(`End-to-End Functionality: ${result.e2eFunctionalityScore}/${BANDS.e2e} points`);
      result.detailedAnalysis.push(...functionalResult.testDetails.map(detail => `  ${detail}`));
    } else {
      result.detailedAnalysis.push(`End-to-End Functionality: 0/${BANDS.e2e} points (testing skipped)`);
    }

    result.requirementsScore = band('Requirements Met', BANDS.requirements, 0, () => {
      let weighted = 0;
      let possible = 0;
      for (const section of sections) {
        if (section.requirements.length === 0) {
          continue;
        }
        const evaluation = this.evaluateSection(projectPath, projectInfo, section);
        result.sections.push(evaluation);
        result.requirementsMet.push(...evaluation.met);
        result.requirementsFailed.push(...evaluation.missed);
        weighted += (evaluation.met.length / section.requirements.length) * section.points;
        possible += section.points;
      }
      return possible > 0 ? Math.floor((weighted / possible) * BANDS.requirements) : 0;
    });

    for (const section of result.sections) {
      result.detailedAnalysis.push(
        `Section '${section.name}': ${section.met.length}/${section.met.length + section.missed.length} requirements met (${section.scorePercentage}%)`
      );
    }

    result.totalScore = clampTotal(
      result.fileStructureScore +
        result.codeQualityScore +
        result.buildScore +
        result.e2eFunctionalityScore +
        result.requirementsScore
    );
    logger.info(`Evaluation completed: ${result.totalScore}/100 points`);
    return result;
  }

  /**
   * Fixed defaults for the structure, code quality and requirements bands when no requirements were supplied
   */
  basicEvaluation(projectInfo: ProjectInfo, buildSucceeded: boolean, functionalResult: FunctionalTestResult | null): EvaluationResult {
    const result: EvaluationResult = {
      fileStructureScore: projectInfo.hasManifest ? 20 : 10,
      codeQualityScore: buildSucceeded ? 15 : 5,
      buildScore: buildSucceeded ? 20 : 5,
      e2eFunctionalityScore: scaleFunctionalScore(functionalResult),
      requirementsScore: buildSucceeded ? 15 : 5,
      totalScore: 0,
      detailedAnalysis: ['Basic evaluation - no requirements document'],
      requirementsMet: [],
      requirementsFailed: [],
      sections: []
    };
    if (functionalResult) {
      result.detailedAnalysis.push(`End-to-End Functionality: ${result.e2eFunctionalityScore}/${BANDS.e2e} points`);
    }
    result.totalScore = clampTotal(
      result.fileStructureScore +
        result.codeQualityScore +
        result.buildScore +
        result.e2eFunctionalityScore +
        result.requirementsScore
    );
    return result;
  }
}
