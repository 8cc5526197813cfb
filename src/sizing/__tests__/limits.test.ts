import { ConfigError, InputShapeError } from '../../errors';
import { validateLimits } from '../limits';

const prefs = {
  max_risk_per_trade_pct: 0.01,
  max_daily_loss_pct: 0.03,
  max_positions: 10,
  max_total_concurrent_risk_pct: 0.05,
};

describe('validateLimits', () => {
  it('returns the four limits and drops unrelated preferences', () => {
    expect(validateLimits({ ...prefs, timezone: 'America/New_York' })).toEqual(prefs);
  });

  it('coerces numeric strings and truncates max_positions', () => {
    expect(
      validateLimits({
        max_risk_per_trade_pct: '0.02',
        max_daily_loss_pct: ' 0.05 ',
        max_positions: 7.9,
        max_total_concurrent_risk_pct: '0.1',
      }),
    ).toEqual({
      max_risk_per_trade_pct: 0.02,
      max_daily_loss_pct: 0.05,
      max_positions: 7,
      max_total_concurrent_risk_pct: 0.1,
    });
  });

  it('names every missing key', () => {
    const { max_positions: _p, max_daily_loss_pct: _d, ...partial } = prefs;
    let caught: unknown;
    try {
      validateLimits(partial);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.message).toBe(
      'preferences.json missing keys: max_daily_loss_pct, max_positions',
    );
    expect(caught instanceof ConfigError && caught.keys).toEqual(['max_daily_loss_pct', 'max_positions']);
  });

  it('rejects non-numeric values with a typed error', () => {
    expect(() => validateLimits({ ...prefs, max_risk_per_trade_pct: 'one percent' })).toThrow(
      new ConfigError('preferences.json has non-numeric values for: max_risk_per_trade_pct'),
    );
    expect(() => validateLimits({ ...prefs, max_positions: null, max_daily_loss_pct: true })).toThrow(
      'preferences.json has non-numeric values for: max_daily_loss_pct, max_positions',
    );
  });

  it('accepts zero and negative limits unchanged', () => {
    const limits = validateLimits({ ...prefs, max_risk_per_trade_pct: 0, max_total_concurrent_risk_pct: -0.5 });
    expect(limits.max_risk_per_trade_pct).toBe(0);
    expect(limits.max_total_concurrent_risk_pct).toBe(-0.5);
  });

  it('rejects a preferences document that is not an object', () => {
    expect(() => validateLimits([prefs])).toThrow(InputShapeError);
    expect(() => validateLimits(null)).toThrow('preferences.json must be a JSON object');
  });
});
