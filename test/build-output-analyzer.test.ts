import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BuildOutputAnalyzer } from '../src/services/build-output-analyzer';
import { makeTempDir, removeDir, writeFiles } from './helpers';

describe('BuildOutputAnalyzer', () => {
  let project: string;
  const analyzer = new BuildOutputAnalyzer();

  beforeEach(() => {
    project = makeTempDir();
  });

  afterEach(() => {
    removeDir(project);
  });

  it('accepts a typical production build', () => {
    writeFiles(project, {
      'build/index.html': '<html><body><div id="root"></div></body></html>',
      'build/static/js/main.abc123.js': 'console.log(1)',
      'build/static/css/main.def456.css': 'body{margin:0}'
    });
    const analysis = analyzer.analyze(project);
    expect(analysis).toMatchObject({
      outputDir: path.join(project, 'build'),
      exists: true,
      fileCount: 3,
      hasIndexHtml: true,
      hasJsFiles: true,
      hasCssFiles: true,
      warnings: [],
      errors: []
    });
  });

  it('reports a missing output directory as an error', () => {
    const analysis = analyzer.analyze(project);
    expect(analysis.exists).toBe(false);
    expect(analysis.errors).toEqual(['No build output directory found']);
  });

  it('reports an empty output directory as an error', () => {
    fs.mkdirSync(path.join(project, 'dist'));
    const analysis = analyzer.analyze(project);
    expect(analysis.outputDir).toBe(path.join(project, 'dist'));
    expect(analysis.errors).toEqual(['Build directory is empty']);
  });

  it('prefers build over dist', () => {
    writeFiles(project, { 'build/index.html': 'a', 'dist/index.html': 'b' });
    expect(analyzer.analyze(project).outputDir).toBe(path.join(project, 'build'));
  });

  it('warns about a sparse output without an entry page or scripts', () => {
    writeFiles(project, { 'dist/style.css': 'p{}' });
    const analysis = analyzer.analyze(project);
    expect(analysis.errors).toEqual([]);
    expect(analysis.warnings).toEqual([
      'No index.html found in build output',
      'No JavaScript files found in build output',
      'Very few files in build output (1)'
    ]);
  });

  it('warns about an unusually large output', () => {
    writeFiles(project, { 'out/index.html': '<html></html>', 'out/app.js': '', 'out/vendor.js': '' });
    fs.writeFileSync(path.join(project, 'out', 'media.bin'), Buffer.alloc(11 * 1024 * 1024));
    const analysis = analyzer.analyze(project);
    expect(analysis.warnings).toEqual(['Build output is unusually large (11.0 MB)']);
  });
});
