import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  DocumentRequirementsSource,
  parseRequirement,
  parseRequirementsText,
  parseSectionHeader,
  toRequirementSpec
} from '../src/services/requirements-source';
import { makeTempDir, removeDir } from './helpers';

const DOCUMENT = [
  'Assignment 3: Todo App',
  '',
  'Technical Requirements (40 points):',
  '- Use React hooks for state',
  '- Create a Header component',
  '• Implement routing with react-router-dom',
  'UI Design - 20 points',
  '1. Responsive layout for mobile',
  '2) Consistent color scheme',
  '## Code Quality',
  '* No console.log statements',
  'Students should submit on time.',
  'Notes:',
  'This line has no bullet and nothing special.'
].join('\n');

describe('parseSectionHeader', () => {
  it('reads the points forms', () => {
    expect(parseSectionHeader('Technical Requirements (40 points):')).toEqual({ section: 'Technical Requirements', points: 40 });
    expect(parseSectionHeader('Styling (15 pts):')).toEqual({ section: 'Styling', points: 15 });
    expect(parseSectionHeader('UI Design - 20 points')).toEqual({ section: 'UI Design', points: 20 });
    expect(parseSectionHeader('Features: 30 points')).toEqual({ section: 'Features', points: 30 });
  });

  it('reads headings and short colon lines without points', () => {
    expect(parseSectionHeader('## Code Quality')).toEqual({ section: 'Code Quality', points: 0 });
    expect(parseSectionHeader('### Bonus (10 points):')).toEqual({ section: 'Bonus', points: 10 });
    expect(parseSectionHeader('Notes:')).toEqual({ section: 'Notes', points: 0 });
  });

  it('rejects bullets and long sentences', () => {
    expect(parseSectionHeader('- Item:')).toBeNull();
    expect(parseSectionHeader('The following list shows what the app must do:')).toBeNull();
    expect(parseSectionHeader('Use hooks')).toBeNull();
  });
});

describe('parseRequirement', () => {
  it('strips bullet markers', () => {
    expect(parseRequirement('- Use hooks')).toBe('Use hooks');
    expect(parseRequirement('• Add a footer')).toBe('Add a footer');
    expect(parseRequirement('3. Show a list')).toBe('Show a list');
    expect(parseRequirement('b) Show a detail view')).toBe('Show a detail view');
  });

  it('accepts sentences with requirement keywords only', () => {
    expect(parseRequirement('The app must persist todos')).toBe('The app must persist todos');
    expect(parseRequirement('Good luck!')).toBeNull();
  });
});

describe('parseRequirementsText', () => {
  it('groups requirements under their sections', () => {
    const { sections, weights } = parseRequirementsText(DOCUMENT);
    expect([...sections]).toEqual([
      ['Technical Requirements', ['Use React hooks for state', 'Create a Header component', 'Implement routing with react-router-dom']],
      ['UI Design', ['Responsive layout for mobile', 'Consistent color scheme']],
      ['Code Quality', ['No console.log statements', 'Students should submit on time.']]
    ]);
    expect([...weights]).toEqual([
      ['Technical Requirements', 40],
      ['UI Design', 20],
      ['Code Quality', 0],
      ['Notes', 0]
    ]);
  });

  it('puts requirements before any header in the General section', () => {
    const { sections } = parseRequirementsText('You must include a README\n- Deploy the app');
    expect([...sections]).toEqual([['General', ['You must include a README', 'Deploy the app']]]);
  });
});

describe('DocumentRequirementsSource', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('loads a text document and builds the requirement spec', async () => {
    const file = path.join(dir, 'requirements.md');
    fs.writeFileSync(file, DOCUMENT);
    const source = new DocumentRequirementsSource();
    await source.load(file);

    expect(source.getRequirementsList()).toHaveLength(7);
    expect(toRequirementSpec(source)).toEqual({
      sections: [
        {
          name: 'Technical Requirements',
          points: 40,
          requirements: ['Use React hooks for state', 'Create a Header component', 'Implement routing with react-router-dom']
        },
        { name: 'UI Design', points: 20, requirements: ['Responsive layout for mobile', 'Consistent color scheme'] },
        { name: 'Code Quality', points: 20, requirements: ['No console.log statements', 'Students should submit on time.'] }
      ]
    });
  });

  it('returns copies of its sections', async () => {
    const file = path.join(dir, 'requirements.txt');
    fs.writeFileSync(file, DOCUMENT);
    const source = new DocumentRequirementsSource();
    await source.load(file);

    source.getRequirementSections().get('UI Design')?.push('Injected');
    expect(source.getRequirementSections().get('UI Design')).toEqual(['Responsive layout for mobile', 'Consistent color scheme']);
  });

  it('summarizes the parsed document', async () => {
    const file = path.join(dir, 'requirements.txt');
    fs.writeFileSync(file, 'Features (10 points):\n- Add todos\n## Extras\n- Dark mode');
    const source = new DocumentRequirementsSource();
    await source.load(file);
    expect(source.summary()).toBe(
      ['Total Requirements: 2', 'Features (10 points):', '  • Add todos', 'Extras:', '  • Dark mode'].join('\n')
    );
  });

  it('rejects a missing document', async () => {
    const source = new DocumentRequirementsSource();
    await expect(source.load(path.join(dir, 'missing.txt'))).rejects.toThrow();
    expect(source.summary()).toBe('No requirements found in the document.');
  });
});
