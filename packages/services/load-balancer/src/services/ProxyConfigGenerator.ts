/**
 * Renders the routing rules as a Caddyfile. The runtime proxy is configured
 * from the rules directly; the text is printed by `--lb-config` and rendered
 * on every start so a broken template fails before anything binds.
 */

import { readFileSync } from 'fs';
import Handlebars from 'handlebars';
import { DomainError, DomainErrorCode, toError } from '@bloxstack/platform-core';
import type { RoutingRuleSet } from '../config/routing-rules';

const TEMPLATE_URL = new URL('../../templates/Caddyfile.hbs', import.meta.url);

const handlebars = Handlebars.create();

const UNITS: ReadonlyArray<[suffix: string, ms: number]> = [
  ['h', 60 * 60 * 1000],
  ['m', 60 * 1000],
  ['s', 1000],
];

/**
 * Largest whole unit: 600000 → `10m`, 90000 → `90s`, 1500 → `1500ms`.
 */
export function formatDuration(ms: number): string {
  if (!Number.isInteger(ms) || ms < 0) {
    throw new Error(`invalid duration: ${ms}`);
  }
  if (ms === 0) return '0s';
  for (const [suffix, size] of UNITS) {
    if (ms % size === 0) return `${ms / size}${suffix}`;
  }
  return `${ms}ms`;
}

handlebars.registerHelper('duration', (value: unknown) => {
  if (typeof value !== 'number') {
    throw new Error(`duration helper expects milliseconds, got ${typeof value}`);
  }
  return formatDuration(value);
});

let compiledTemplate: Handlebars.TemplateDelegate<RoutingRuleSet> | undefined;

function defaultTemplate(): Handlebars.TemplateDelegate<RoutingRuleSet> {
  if (!compiledTemplate) {
    compiledTemplate = compileCaddyfileTemplate(readFileSync(TEMPLATE_URL, 'utf8'));
  }
  return compiledTemplate;
}

export function compileCaddyfileTemplate(source: string): Handlebars.TemplateDelegate<RoutingRuleSet> {
  return handlebars.compile<RoutingRuleSet>(source, { strict: true, noEscape: true });
}

/**
 * Same rules in, same bytes out.
 */
export function renderCaddyfile(
  rules: RoutingRuleSet,
  template: Handlebars.TemplateDelegate<RoutingRuleSet> = defaultTemplate()
): string {
  try {
    return template(rules);
  } catch (error) {
    throw new DomainError(
      `failed to render load balancer configuration: ${toError(error).message}`,
      500,
      toError(error),
      DomainErrorCode.CONFIGURATION_ERROR
    );
  }
}
