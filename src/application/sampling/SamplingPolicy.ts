/**
 * spanline - Request Sampling
 *
 * Decides which request events are kept. Decisions are made per request at
 * emit time; statistics recording is not affected.
 */

import {
  parseOptions,
  SamplingSettings,
  SamplingSettingsInput,
  samplingOptionsSchema,
} from '../../infrastructure/config';

/**
 * Sampling decision result
 */
export interface SamplingDecision {
  sampled: boolean;
  /** Rule that decided */
  reason: 'error' | 'excluded' | 'override' | 'rate';
  /** Rate that applied; 1 for errors, 0 for excluded routes */
  rate: number;
}

/**
 * What a decision is made on
 */
export interface SamplingContext {
  route: string;
  status?: number;
}

type RouteMatcher = string | RegExp;

function matches(matcher: RouteMatcher, route: string): boolean {
  if (typeof matcher === 'string') {
    return route.startsWith(matcher);
  }
  matcher.lastIndex = 0;
  return matcher.test(route);
}

/**
 * mulberry32: small seedable generator returning floats in [0, 1).
 */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Rule-based request sampler.
 *
 * Rules are checked in order: server errors (when `alwaysSampleErrors`),
 * excluded routes, the first matching route override, then `sampleRate`.
 *
 * @example
 * ```typescript
 * const policy = new SamplingPolicy({
 *   sampleRate: 0.1,
 *   excludeRoutes: ['/health', /^\/static\//],
 *   routeOverrides: [{ match: '/checkout', rate: 1 }],
 * });
 *
 * policy.shouldSample({ route: '/checkout/pay', status: 200 }).sampled; // true
 * policy.shouldSample({ route: '/health' }).sampled;                     // false
 * ```
 */
export class SamplingPolicy {
  readonly settings: Readonly<SamplingSettings>;
  private readonly random: () => number;

  constructor(options: SamplingSettingsInput = {}) {
    this.settings = Object.freeze(parseOptions(samplingOptionsSchema, options, 'sampling'));
    this.random =
      this.settings.seed !== undefined ? mulberry32(this.settings.seed) : Math.random;
  }

  shouldSample(context: SamplingContext): SamplingDecision {
    const { route, status } = context;

    if (this.settings.alwaysSampleErrors && status !== undefined && status >= 500) {
      return { sampled: true, reason: 'error', rate: 1 };
    }

    if (this.settings.excludeRoutes.some((matcher) => matches(matcher, route))) {
      return { sampled: false, reason: 'excluded', rate: 0 };
    }

    const override = this.settings.routeOverrides.find((rule) => matches(rule.match, route));
    if (override) {
      return { sampled: this.draw(override.rate), reason: 'override', rate: override.rate };
    }

    return {
      sampled: this.draw(this.settings.sampleRate),
      reason: 'rate',
      rate: this.settings.sampleRate,
    };
  }

  private draw(rate: number): boolean {
    if (rate >= 1) return true;
    if (rate <= 0) return false;
    return this.random() < rate;
  }
}
