import * as fs from 'fs';
import * as path from 'path';
import * as mammoth from 'mammoth';
import { logger } from '../utils/logger';
import type { RequirementSpec, RequirementsSource } from '../types';

export const DEFAULT_SECTION = 'General';
export const DEFAULT_SECTION_POINTS = 20;

const HEADER_PATTERNS = [
  /^(.+?)\s*\((\d+)\s*points?\):\s*$/i,
  /^(.+?)\s*\((\d+)\s*pts?\):\s*$/i,
  /^(.+?)\s*-\s*(\d+)\s*points?\s*$/i,
  /^(.+?)\s*:\s*(\d+)\s*points?\s*$/i
];

const BULLET_PATTERNS = [
  /^[•·▪▫‣⁃]\s*(.+)$/,
  /^[-*+]\s+(.+)$/,
  /^\d+[.)]\s*(.+)$/,
  /^[a-zA-Z][.)]\s+(.+)$/
];

const REQUIREMENT_KEYWORDS = /\b(must|should|need|require|include|use|implement|create)/i;

export interface SectionHeader {
  section: string;
  points: number;
}

/**
 * Recognizes "Title (40 points):", "Title (40 pts):", "Title - 40 points", "Title: 40 points",
 * markdown headings and short lines ending in a colon
 */
export function parseSectionHeader(line: string): SectionHeader | null {
  const heading = line.match(/^#{1,6}\s+(.+)$/);
  const text = heading?.[1]?.trim() ?? line;

  for (const pattern of HEADER_PATTERNS) {
    const match = text.match(pattern);
    if (match?.[1] && match[2]) {
      return { section: match[1].trim(), points: parseInt(match[2]) };
    }
  }
  if (heading) {
    return { section: text.replace(/:$/, '').trim(), points: 0 };
  }
  if (text.endsWith(':') && text.split(/\s+/).length <= 5 && !BULLET_PATTERNS.some(pattern => pattern.test(text))) {
    return { section: text.slice(0, -1).trim(), points: 0 };
  }
  return null;
}

/**
 * Returns the requirement text of a bullet or requirement-like sentence
 */
export function parseRequirement(line: string): string | null {
  for (const pattern of BULLET_PATTERNS) {
    const match = line.match(pattern);
    if (match?.[1]) {
      return match[1].trim();
    }
  }
  return REQUIREMENT_KEYWORDS.test(line) ? line.trim() : null;
}

export interface ParsedRequirements {
  sections: Map<string, string[]>;
  weights: Map<string, number>;
}

/**
 * Groups requirement lines under the section header that precedes them
 */
export function parseRequirementsText(text: string): ParsedRequirements {
  const sections = new Map<string, string[]>();
  const weights = new Map<string, number>();
  let current = DEFAULT_SECTION;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    const header = parseSectionHeader(line);
    if (header) {
      current = header.section;
      weights.set(current, header.points);
      continue;
    }
    const requirement = parseRequirement(line);
    if (requirement) {
      const list = sections.get(current) ?? [];
      list.push(requirement);
      sections.set(current, list);
    }
  }
  return { sections, weights };
}

/**
 * Reads assignment requirements from a .docx, .md or .txt document
 */
export class DocumentRequirementsSource implements RequirementsSource {
  private parsed: ParsedRequirements = { sections: new Map(), weights: new Map() };

  async load(source: string): Promise<void> {
    const ext = path.extname(source).toLowerCase();
    logger.info(`Reading requirements from ${source}`);
    let text: string;
    if (ext === '.docx') {
      const result = await mammoth.extractRawText({ path: source });
      for (const message of result.messages) {
        logger.debug(`Requirements document: ${message.message}`);
      }
      text = result.value;
    } else {
      text = await fs.promises.readFile(source, 'utf-8');
    }
    this.parsed = parseRequirementsText(text);
    const count = [...this.parsed.sections.values()].reduce((sum, list) => sum + list.length, 0);
    logger.info(`Parsed ${count} requirements in ${this.parsed.sections.size} sections`);
  }

  getRequirementSections(): Map<string, string[]> {
    return new Map([...this.parsed.sections].map(([name, list]) => [name, [...list]]));
  }

  getPointWeights(): Map<string, number> {
    return new Map(this.parsed.weights);
  }

  getRequirementsList(): string[] {
    return [...this.parsed.sections.values()].flat();
  }

  /**
   * Readable outline of the parsed requirements
   */
  summary(): string {
    const requirements = this.getRequirementsList();
    if (requirements.length === 0) {
      return 'No requirements found in the document.';
    }
    const lines = [`Total Requirements: ${requirements.length}`];
    for (const [section, list] of this.parsed.sections) {
      const points = this.parsed.weights.get(section) ?? 0;
      lines.push(points > 0 ? `${section} (${points} points):` : `${section}:`);
      lines.push(...list.map(requirement => `  • ${requirement}`));
    }
    return lines.join('\n');
  }
}

/**
 * Builds the pipeline's requirement spec. Sections without a weight count as 20 points.
 */
export function toRequirementSpec(source: RequirementsSource): RequirementSpec {
  const weights = source.getPointWeights();
  const sections = [...source.getRequirementSections()]
    .filter(([, requirements]) => requirements.length > 0)
    .map(([name, requirements]) => {
      const weight = weights.get(name) ?? 0;
      return { name, requirements, points: weight > 0 ? weight : DEFAULT_SECTION_POINTS };
    });
  return { sections };
}
