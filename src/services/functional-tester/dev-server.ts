import * as net from 'net';
import { spawn } from 'child_process';
import type { ChildProcess } from 'child_process';
import { logger } from '../../utils/logger';
import { errorMessage, sleep } from '../../utils/tools';
import { killProcessTree } from '../toolchain-runner';
import type { CommandSpec } from '../toolchain-runner';

/**
 * Error thrown when no port in the search range can be bound.
 */
export class PortUnavailableError extends Error {
  constructor(basePort: number, range: number) {
    super(`No free port between ${basePort} and ${basePort + range - 1}`);
    this.name = 'PortUnavailableError';
  }
}

/**
 * Error thrown when the development server exits or never answers with HTTP 200.
 */
export class ServerStartupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ServerStartupError';
  }
}

function canBind(port: number): Promise<boolean> {
  return new Promise(resolve => {
    const server = net.createServer();
    server.once('error', () => resolve(false));
    server.once('listening', () => {
      server.close(() => resolve(true));
    });
    server.listen(port, '127.0.0.1');
  });
}

/**
 * Scans upward from basePort for a port that can be bound
 */
export async function findFreePort(basePort: number, range: number): Promise<number> {
  for (let port = basePort; port < basePort + range; port++) {
    if (await canBind(port)) {
      return port;
    }
  }
  throw new PortUnavailableError(basePort, range);
}

export type DevServerState = 'idle' | 'starting' | 'ready' | 'failed' | 'stopped';

export interface DevServerOptions {
  startupTimeout: number;
  pollInterval: number;
  httpTimeout: number;
  shutdownTimeout: number;
}

/**
 * A development server child process bound to one port
 */
export class DevServer {
  state: DevServerState = 'idle';
  private child?: ChildProcess;
  private exitCode: number | null = null;
  private exited = false;
  private stderr = '';

  constructor(
    private readonly command: CommandSpec,
    private readonly cwd: string,
    readonly port: number,
    private readonly options: DevServerOptions
  ) {}

  get url(): string {
    return `http://localhost:${this.port}`;
  }

  /**
   * Spawns the server and waits until it answers GET / with 200
   */
  async start(): Promise<void> {
    this.state = 'starting';
    logger.info(`Starting development server on port ${this.port}: ${this.command.command} ${this.command.args.join(' ')}`);

    const child = spawn(this.command.command, this.command.args, {
      cwd: this.cwd,
      env: { ...process.env, PORT: String(this.port), BROWSER: 'none', CI: 'true' },
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: process.platform !== 'win32',
      shell: process.platform === 'win32'
    });
    this.child = child;

    child.stdout.on('data', () => {
      // drained so the child never blocks on a full pipe
    });
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      this.stderr = (this.stderr + chunk).slice(-4000);
    });
    child.on('error', error => {
      this.stderr += errorMessage(error);
      this.exited = true;
    });
    child.on('exit', code => {
      this.exited = true;
      this.exitCode = code;
    });

    const deadline = Date.now() + this.options.startupTimeout;
    while (Date.now() < deadline) {
      if (this.exited) {
        this.state = 'failed';
        throw new ServerStartupError(
          `Development server exited with code ${this.exitCode}: ${this.stderr.trim().slice(-500)}`
        );
      }
      if (await this.respondsOk()) {
        this.state = 'ready';
        logger.info(`Development server ready at ${this.url}`);
        return;
      }
      await sleep(this.options.pollInterval);
    }

    this.state = 'failed';
    throw new ServerStartupError(
      `Development server did not respond within ${Math.round(this.options.startupTimeout / 1000)}s`
    );
  }

  private async respondsOk(): Promise<boolean> {
    try {
      const response = await fetch(this.url, { signal: AbortSignal.timeout(this.options.httpTimeout) });
      await response.arrayBuffer();
      return response.status === 200;
    } catch (error) {
      logger.debug(`Server not ready yet: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Terminates the server: SIGTERM, a grace period, then SIGKILL to the whole process group
   */
  async stop(): Promise<void> {
    const child = this.child;
    if (!child) {
      this.state = 'stopped';
      return;
    }
    if (!this.exited) {
      killProcessTree(child, 'SIGTERM');
      const deadline = Date.now() + this.options.shutdownTimeout;
      while (!this.exited && Date.now() < deadline) {
        await sleep(100);
      }
      if (!this.exited) {
        logger.warn(`Development server on port ${this.port} ignored SIGTERM, killing`);
      }
    }
    // descendants can outlive the script runner that started them
    killProcessTree(child, 'SIGKILL');
    this.state = 'stopped';
  }
}
