import { config } from '../../config';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/tools';
import { ToolchainRunner } from '../toolchain-runner';
import type { FunctionalTestResult, ProjectInfo } from '../../types';
import { DevServer, findFreePort } from './dev-server';
import type { DevServerOptions } from './dev-server';
import { runProbes } from './probes';
import type { ProbeStrategy } from './probes';
import { bundledChromiumStrategy, systemChromeStrategy } from './browser-strategy';
import { StaticHtmlProbeStrategy } from './static-strategy';

export { PortUnavailableError, ServerStartupError, findFreePort } from './dev-server';
export { runProbes, hasRequirementEvidence } from './probes';
export type { ProbeOutcome, ProbeSession, ProbeStrategy } from './probes';

export const REACT_FINGERPRINTS = ['react', 'div id="root"', 'div id="app"', 'react-dom', 'bundle.js', 'main.js'];
export const MIN_FINGERPRINT_MATCHES = 2;

export type FunctionalTestPhase = 'idle' | 'server-starting' | 'server-ready' | 'server-failed' | 'probing' | 'torn-down';

/**
 * True when the HTML carries at least two React fingerprints
 */
export function looksLikeReactApp(html: string): boolean {
  const lower = html.toLowerCase();
  return REACT_FINGERPRINTS.filter(fingerprint => lower.includes(fingerprint)).length >= MIN_FINGERPRINT_MATCHES;
}

function emptyResult(): FunctionalTestResult {
  return {
    appLoads: false,
    contentRenders: false,
    buttonsWork: false,
    navigationWorks: false,
    formsWork: false,
    functionalityScore: 0,
    testDetails: [],
    errors: []
  };
}

export interface FunctionalTester {
  run(projectPath: string, projectInfo: ProjectInfo, requirements: string[]): Promise<FunctionalTestResult>;
}

export interface FunctionalTestRunnerOptions {
  toolchain?: ToolchainRunner;
  strategies?: ProbeStrategy[];
  basePort?: number;
  portRange?: number;
  server?: Partial<DevServerOptions>;
}

/**
 * Serves a project locally and scores how it behaves in a browser
 */
export class FunctionalTestRunner implements FunctionalTester {
  private readonly toolchain: ToolchainRunner;
  private readonly strategies: ProbeStrategy[];
  private readonly basePort: number;
  private readonly portRange: number;
  private readonly serverOptions: DevServerOptions;
  private selected?: Promise<ProbeStrategy>;
  phase: FunctionalTestPhase = 'idle';

  constructor(options: FunctionalTestRunnerOptions = {}) {
    this.toolchain = options.toolchain ?? new ToolchainRunner();
    this.strategies = options.strategies ?? [
      bundledChromiumStrategy(),
      systemChromeStrategy(),
      new StaticHtmlProbeStrategy()
    ];
    this.basePort = options.basePort ?? config.functionalTests.basePort;
    this.portRange = options.portRange ?? config.functionalTests.portRange;
    this.serverOptions = {
      startupTimeout: config.timeouts.serverStartup,
      pollInterval: config.timeouts.pollInterval,
      httpTimeout: config.timeouts.httpProbe,
      shutdownTimeout: config.timeouts.serverShutdown,
      ...options.server
    };
  }

  /**
   * The first available strategy, detected once per runner
   */
  selectStrategy(): Promise<ProbeStrategy> {
    if (!this.selected) {
      this.selected = this.detectStrategy();
    }
    return this.selected;
  }

  private async detectStrategy(): Promise<ProbeStrategy> {
    for (const strategy of this.strategies) {
      if (await strategy.isAvailable()) {
        logger.info(`Functional tests will use the ${strategy.name} strategy`);
        return strategy;
      }
    }
    logger.warn('No probe strategy reported itself available, falling back to static HTML parsing');
    return new StaticHtmlProbeStrategy();
  }

  async run(projectPath: string, projectInfo: ProjectInfo, requirements: string[]): Promise<FunctionalTestResult> {
    const result = emptyResult();
    this.phase = 'idle';

    if (!projectInfo.startScript) {
      result.errors.push('No start or dev script in package.json');
      result.testDetails.push('FAIL Development server: no start or dev script in package.json');
      return result;
    }

    let server: DevServer | undefined;
    try {
      this.phase = 'server-starting';
      const port = await findFreePort(this.basePort, this.portRange);
      const command = this.toolchain.serveCommand(projectInfo.packageManager, projectInfo.startScript, port);
      server = new DevServer(command, projectPath, port, this.serverOptions);
      await server.start();
      this.phase = 'server-ready';
      result.testDetails.push(`PASS Development server started at ${server.url}`);

      const response = await fetch(server.url, { signal: AbortSignal.timeout(this.serverOptions.httpTimeout) });
      const html = await response.text();
      result.appLoads = looksLikeReactApp(html);
      if (!result.appLoads) {
        result.errors.push('App responded but was not recognized as a React app');
        result.testDetails.push('FAIL App load: page does not look like a React app');
        return result;
      }
      result.testDetails.push('PASS App load: React app recognized');

      this.phase = 'probing';
      const strategy = await this.selectStrategy();
      result.strategy = strategy.name;
      const session = await strategy.open(server.url);
      try {
        const report = await runProbes(session, requirements);
        result.contentRenders = report.contentRenders;
        result.buttonsWork = report.buttonsWork;
        result.navigationWorks = report.navigationWorks;
        result.formsWork = report.formsWork;
        result.functionalityScore = report.score;
        result.testDetails.push(...report.details);
        result.errors.push(...report.errors);
      } finally {
        await session.close().catch(error => {
          logger.warn(`Could not close ${strategy.name} session: ${errorMessage(error)}`);
        });
      }
    } catch (error) {
      if (!server || server.state === 'failed') {
        this.phase = 'server-failed';
      }
      logger.error(`Functional testing error: ${error}`);
      result.errors.push(`Functional testing error: ${errorMessage(error)}`);
      result.testDetails.push(`FAIL ${errorMessage(error)}`);
    } finally {
      if (server) {
        await server.stop();
      }
      this.phase = 'torn-down';
    }

    logger.info(`Functionality score: ${result.functionalityScore}/100`);
    return result;
  }
}
