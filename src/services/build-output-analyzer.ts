import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger';
import { errorMessage, isDirectory, listFiles } from '../utils/tools';
import type { BuildOutputAnalysis } from '../types';

export const OUTPUT_DIRECTORY_CANDIDATES = ['build', 'dist', 'out'];
export const MIN_EXPECTED_FILES = 3;
export const LARGE_OUTPUT_BYTES = 10 * 1024 * 1024;

function emptyAnalysis(): BuildOutputAnalysis {
  return {
    outputDir: null,
    exists: false,
    fileCount: 0,
    totalSize: 0,
    hasIndexHtml: false,
    hasJsFiles: false,
    hasCssFiles: false,
    warnings: [],
    errors: []
  };
}

/**
 * Inspects the build output directory of a project
 */
export class BuildOutputAnalyzer {
  constructor(private readonly candidates: string[] = OUTPUT_DIRECTORY_CANDIDATES) {}

  analyze(projectPath: string): BuildOutputAnalysis {
    const analysis = emptyAnalysis();

    const outputName = this.candidates.find(name => isDirectory(path.join(projectPath, name)));
    if (!outputName) {
      analysis.errors.push('No build output directory found');
      return analysis;
    }

    const outputDir = path.join(projectPath, outputName);
    analysis.outputDir = outputDir;
    analysis.exists = true;

    try {
      const files = listFiles(outputDir);
      analysis.fileCount = files.length;
      for (const file of files) {
        analysis.totalSize += fs.statSync(file).size;
        const base = path.basename(file).toLowerCase();
        const ext = path.extname(base);
        if (base === 'index.html') {
          analysis.hasIndexHtml = true;
        } else if (ext === '.js' || ext === '.mjs') {
          analysis.hasJsFiles = true;
        } else if (ext === '.css') {
          analysis.hasCssFiles = true;
        }
      }
    } catch (error) {
      logger.warn(`Could not read build output in ${outputDir}: ${errorMessage(error)}`);
      analysis.errors.push(`Could not read build output: ${errorMessage(error)}`);
      return analysis;
    }

    if (analysis.fileCount === 0) {
      analysis.errors.push('Build directory is empty');
      return analysis;
    }
    if (!analysis.hasIndexHtml) {
      analysis.warnings.push('No index.html found in build output');
    }
    if (!analysis.hasJsFiles) {
      analysis.warnings.push('No JavaScript files found in build output');
    }
    if (analysis.fileCount < MIN_EXPECTED_FILES) {
      analysis.warnings.push(`Very few files in build output (${analysis.fileCount})`);
    }
    if (analysis.totalSize > LARGE_OUTPUT_BYTES) {
      const megabytes = (analysis.totalSize / (1024 * 1024)).toFixed(1);
      analysis.warnings.push(`Build output is unusually large (${megabytes} MB)`);
    }

    logger.debug(`Build output ${outputDir}: ${analysis.fileCount} files, ${analysis.totalSize} bytes`);
    return analysis;
  }
}
