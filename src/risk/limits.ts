/**
 * Risk limits
 * Immutable records - a change produces a new record that replaces the old one
 */

export interface RiskLimits {
  readonly maxPositionSize: number;
  readonly maxOrderSize: number;
  readonly maxOpenPositions: number;   // integer
  readonly maxDailyLoss: number;
  readonly strategyCaps: Readonly<Record<string, number>>;
}

export const DEFAULT_RISK_LIMITS: RiskLimits = Object.freeze({
  maxPositionSize: 100,
  maxOrderSize: 50,
  maxOpenPositions: 10,
  maxDailyLoss: 100,
  strategyCaps: Object.freeze({}),
});

export function createRiskLimits(overrides: Partial<RiskLimits> = {}): RiskLimits {
  return Object.freeze({
    ...DEFAULT_RISK_LIMITS,
    ...overrides,
    strategyCaps: Object.freeze({ ...(overrides.strategyCaps ?? DEFAULT_RISK_LIMITS.strategyCaps) }),
  });
}

/**
 * Per-strategy order cap, falling back to the global max order size
 */
export function capForStrategy(limits: RiskLimits, strategy: string): number {
  return Object.hasOwn(limits.strategyCaps, strategy) ? limits.strategyCaps[strategy] : limits.maxOrderSize;
}

type LimitField = Exclude<keyof RiskLimits, 'strategyCaps'>;
type LimitSetter = (limits: RiskLimits, value: number) => RiskLimits;
type MutableLimits = { -readonly [K in keyof RiskLimits]: RiskLimits[K] };

const STRATEGY_PREFIX = 'strategy.';

function numberSetter(field: LimitField): LimitSetter {
  return (limits, value) => {
    const next: MutableLimits = { ...limits };
    next[field] = value;
    return Object.freeze(next);
  };
}

function integerSetter(field: LimitField): LimitSetter {
  const set = numberSetter(field);
  return (limits, value) => set(limits, Math.trunc(value));
}

// Admin parameter names -> typed setters. Anything not listed is rejected.
const LIMIT_SETTERS: ReadonlyMap<string, LimitSetter> = new Map([
  ['max_position_size', numberSetter('maxPositionSize')],
  ['max_order_size', numberSetter('maxOrderSize')],
  ['max_open_positions', integerSetter('maxOpenPositions')],
  ['max_daily_loss', numberSetter('maxDailyLoss')],
  ['maxPositionSize', numberSetter('maxPositionSize')],
  ['maxOrderSize', numberSetter('maxOrderSize')],
  ['maxOpenPositions', integerSetter('maxOpenPositions')],
  ['maxDailyLoss', numberSetter('maxDailyLoss')],
]);

export const LIMIT_PARAMS: readonly string[] = [
  'max_position_size',
  'max_order_size',
  'max_open_positions',
  'max_daily_loss',
  `${STRATEGY_PREFIX}<name>`,
];

/**
 * Apply one named limit change
 * @returns the updated limits, or null if the name or value is invalid
 */
export function applyLimit(limits: RiskLimits, param: string, value: number): RiskLimits | null {
  if (!Number.isFinite(value) || value < 0) {
    return null;
  }

  if (param.startsWith(STRATEGY_PREFIX)) {
    const strategy = param.slice(STRATEGY_PREFIX.length);
    if (!strategy) {
      return null;
    }
    return Object.freeze({
      ...limits,
      strategyCaps: Object.freeze({ ...limits.strategyCaps, [strategy]: value }),
    });
  }

  const setter = LIMIT_SETTERS.get(param);
  return setter ? setter(limits, value) : null;
}
