import { parse } from 'node-html-parser';
import type { HTMLElement } from 'node-html-parser';
import { config } from '../../config';
import type { ProbeOutcome, ProbeSession, ProbeStrategy } from './probes';

class StaticProbeSession implements ProbeSession {
  private readonly root: HTMLElement;

  constructor(private readonly html: string) {
    this.root = parse(html);
    for (const element of this.root.querySelectorAll('script, style, noscript')) {
      element.remove();
    }
  }

  async renderedText(): Promise<string> {
    const body = this.root.querySelector('body') ?? this.root;
    return body.text.replace(/\s+/g, ' ').trim();
  }

  async pageContent(): Promise<string> {
    return this.html;
  }

  async probeButtons(): Promise<ProbeOutcome> {
    const count = this.root.querySelectorAll('button, input[type="button"], input[type="submit"]').length;
    return count > 0
      ? { status: 'partial', detail: `found ${count} buttons in static HTML (not clicked)` }
      : { status: 'absent', detail: 'no buttons found' };
  }

  async probeForms(): Promise<ProbeOutcome> {
    const forms = this.root.querySelectorAll('form').length;
    const fields = this.root.querySelectorAll('input[type="text"], input[type="email"], input[type="password"], textarea').length;
    return forms + fields > 0
      ? { status: 'partial', detail: `found ${forms} forms and ${fields} fields in static HTML (not filled)` }
      : { status: 'absent', detail: 'no form fields found' };
  }

  async probeNavigation(): Promise<ProbeOutcome> {
    const count = this.root.querySelectorAll('a[href]').length;
    return count > 0
      ? { status: 'partial', detail: `found ${count} links in static HTML (not followed)` }
      : { status: 'absent', detail: 'no links found' };
  }

  async close(): Promise<void> {
    // nothing held open
  }
}

export function openStaticSession(html: string): ProbeSession {
  return new StaticProbeSession(html);
}

/**
 * Parses the served HTML without executing it. Always available.
 */
export class StaticHtmlProbeStrategy implements ProbeStrategy {
  readonly name = 'static-html';

  constructor(private readonly requestTimeout: number = config.timeouts.httpProbe * 5) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async open(url: string): Promise<ProbeSession> {
    const response = await fetch(url, { signal: AbortSignal.timeout(this.requestTimeout) });
    if (!response.ok) {
      throw new Error(`GET ${url} returned ${response.status}`);
    }
    return openStaticSession(await response.text());
  }
}
