import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/tools';

export type ProbeStatus = 'pass' | 'partial' | 'fail' | 'absent';

export interface ProbeOutcome {
  status: ProbeStatus;
  detail: string;
}

/**
 * An open page that the generic interaction probes run against
 */
export interface ProbeSession {
  renderedText(): Promise<string>;
  pageContent(): Promise<string>;
  probeButtons(): Promise<ProbeOutcome>;
  probeForms(): Promise<ProbeOutcome>;
  probeNavigation(): Promise<ProbeOutcome>;
  close(): Promise<void>;
}

/**
 * A way of driving a served app. Strategies differ in fidelity, not in result shape.
 */
export interface ProbeStrategy {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  open(url: string): Promise<ProbeSession>;
}

export const RENDER_MIN_TEXT_LENGTH = 50;
export const REQUIREMENT_EVIDENCE_BUDGET = 30;

export const PROBE_POINTS = {
  render: { pass: 15, partial: 0 },
  buttons: { pass: 20, partial: 10 },
  navigation: { pass: 20, partial: 5 },
  forms: { pass: 15, partial: 10 }
} as const;

export interface ProbeReport {
  contentRenders: boolean;
  buttonsWork: boolean;
  navigationWorks: boolean;
  formsWork: boolean;
  score: number;
  details: string[];
  errors: string[];
}

/**
 * Words of a requirement that are long enough to count as evidence
 */
export function requirementKeywords(requirement: string): string[] {
  return requirement
    .toLowerCase()
    .split(/[^a-z0-9-]+/)
    .filter(word => word.length > 2);
}

/**
 * A requirement is evidenced when at least half of its keywords occur in the page
 */
export function hasRequirementEvidence(requirement: string, pageText: string): boolean {
  const keywords = requirementKeywords(requirement);
  if (keywords.length === 0) {
    return false;
  }
  const haystack = pageText.toLowerCase();
  const matches = keywords.filter(keyword => haystack.includes(keyword)).length;
  return matches >= Math.ceil(keywords.length / 2);
}

function pointsFor(outcome: ProbeOutcome, points: { pass: number; partial: number }): number {
  if (outcome.status === 'pass') {
    return points.pass;
  }
  if (outcome.status === 'partial') {
    return points.partial;
  }
  return 0;
}

/**
 * Runs every probe against a session and scores the results on a 0-100 scale.
 * A probe that throws is recorded as failed and the remaining probes still run.
 */
export async function runProbes(session: ProbeSession, requirements: string[]): Promise<ProbeReport> {
  const report: ProbeReport = {
    contentRenders: false,
    buttonsWork: false,
    navigationWorks: false,
    formsWork: false,
    score: 0,
    details: [],
    errors: []
  };

  const attempt = async (label: string, probe: () => Promise<void>) => {
    try {
      await probe();
    } catch (error) {
      logger.warn(`${label} probe failed: ${errorMessage(error)}`);
      report.errors.push(`${label} probe error: ${errorMessage(error)}`);
      report.details.push(`FAIL ${label}: ${errorMessage(error)}`);
    }
  };

  const record = (label: string, outcome: ProbeOutcome, points: { pass: number; partial: number }) => {
    const earned = pointsFor(outcome, points);
    report.score += earned;
    const tag = outcome.status === 'pass' ? 'PASS' : outcome.status === 'partial' ? 'PARTIAL' : 'FAIL';
    report.details.push(`${tag} ${label}: ${outcome.detail} (+${earned})`);
    return outcome.status === 'pass' || outcome.status === 'partial';
  };

  await attempt('Content render', async () => {
    const text = (await session.renderedText()).trim();
    const renders = text.length > RENDER_MIN_TEXT_LENGTH;
    report.contentRenders = renders;
    record('Content render', {
      status: renders ? 'pass' : 'fail',
      detail: renders ? `page shows ${text.length} characters of text` : `page shows only ${text.length} characters of text`
    }, PROBE_POINTS.render);
  });

  await attempt('Buttons', async () => {
    report.buttonsWork = record('Buttons', await session.probeButtons(), PROBE_POINTS.buttons);
  });

  await attempt('Forms', async () => {
    report.formsWork = record('Forms', await session.probeForms(), PROBE_POINTS.forms);
  });

  await attempt('Navigation', async () => {
    report.navigationWorks = record('Navigation', await session.probeNavigation(), PROBE_POINTS.navigation);
  });

  if (requirements.length > 0) {
    await attempt('Requirement evidence', async () => {
      const content = await session.pageContent();
      const share = REQUIREMENT_EVIDENCE_BUDGET / requirements.length;
      let hits = 0;
      for (const requirement of requirements) {
        if (hasRequirementEvidence(requirement, content)) {
          hits++;
          report.details.push(`PASS Requirement evidence: "${requirement}"`);
        }
      }
      report.score += hits * share;
      report.details.push(`Requirement evidence found for ${hits}/${requirements.length} requirements`);
    });
  }

  report.score = Math.min(100, Math.round(report.score));
  return report;
}
