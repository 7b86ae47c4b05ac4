import {
  formatSeconds,
  isValidDuration,
  MAX_DURATION_SECONDS,
  parseDuration,
} from '../../src/mustgather/DurationParser';

describe('parseDuration', () => {
  it.each([
    ['30s', 30],
    ['6m20s', 380],
    ['2h10m30s', 7830],
    ['1.5h', 5400],
    ['.5s', 0.5],
    ['1s2s', 3],
    ['0', 0],
  ])('parses %s as %d seconds', (text, seconds) => {
    expect(parseDuration(text)).toBe(seconds);
  });

  it.each(['', 'notaduration', '10', '5m5', ' 5s', '5d', '-5s', '+5s', '1h ', '500ms', '10us'])(
    'rejects %j',
    (text) => {
      expect(parseDuration(text)).toBeUndefined();
      expect(isValidDuration(text)).toBe(false);
    },
  );

  it('accepts the largest representable duration', () => {
    expect(parseDuration('2562047h')).toBe(9_223_369_200);
    expect(parseDuration('2562047h47m16s')).toBe(9_223_372_036);
  });

  it('rejects durations past the representable range', () => {
    expect(parseDuration('2562048h')).toBeUndefined();
    expect(parseDuration('99999999999999999999999h')).toBeUndefined();
    expect(MAX_DURATION_SECONDS).toBeLessThan(2562048 * 3600);
  });

  it('keeps no state between calls', () => {
    expect(parseDuration('bad')).toBeUndefined();
    expect(parseDuration('10m')).toBe(600);
  });
});

describe('formatSeconds', () => {
  it('formats whole seconds', () => {
    expect(formatSeconds(600)).toBe('600s');
  });

  it('keeps at most millisecond precision', () => {
    expect(formatSeconds(0.5)).toBe('0.5s');
    expect(formatSeconds(1 / 3)).toBe('0.333s');
  });

  it('never renders a positive duration as zero', () => {
    expect(formatSeconds(0.0001)).toBe('0.001s');
    expect(formatSeconds(0)).toBe('0s');
  });

  it('renders the largest duration without an exponent', () => {
    expect(formatSeconds(9_223_372_036)).toBe('9223372036s');
  });
});
