import { ValueResolver } from '../../src/services/value-resolver.service';
import { START } from '../helpers';

describe('ValueResolver', () => {
  const resolver = new ValueResolver();

  it('should resolve "ago" expressions relative to the evaluation time', () => {
    const resolved = resolver.resolve(
      { type: 'relative', amount: 7, unit: 'days', direction: 'ago' },
      START,
    );

    expect(resolved).toEqual(new Date('2024-12-25T00:00:00.000Z'));
  });

  it('should resolve "from_now" expressions forward in time', () => {
    expect(
      resolver.resolveRelative(
        { type: 'relative', amount: 2, unit: 'hours', direction: 'from_now' },
        START,
      ),
    ).toEqual(new Date('2025-01-01T02:00:00.000Z'));
  });

  it('should treat a week as seven days and a minute as 60 seconds', () => {
    expect(
      resolver.resolveRelative(
        { type: 'relative', amount: 1, unit: 'weeks', direction: 'ago' },
        START,
      ),
    ).toEqual(new Date('2024-12-25T00:00:00.000Z'));
    expect(
      resolver.resolveRelative(
        { type: 'relative', amount: 90, unit: 'minutes', direction: 'from_now' },
        START,
      ),
    ).toEqual(new Date('2025-01-01T01:30:00.000Z'));
  });

  it('should re-resolve on every call instead of caching', () => {
    const expression = {
      type: 'relative',
      amount: 1,
      unit: 'days',
      direction: 'ago',
    } as const;

    const first = resolver.resolve(expression, START);
    const later = resolver.resolve(
      expression,
      new Date('2025-01-10T00:00:00.000Z'),
    );

    expect(first).toEqual(new Date('2024-12-31T00:00:00.000Z'));
    expect(later).toEqual(new Date('2025-01-09T00:00:00.000Z'));
  });

  it('should pass literals and arrays through unchanged', () => {
    expect(resolver.resolve(70, START)).toBe(70);
    expect(resolver.resolve('new', START)).toBe('new');
    expect(resolver.resolve(['a', 'b'], START)).toEqual(['a', 'b']);
  });
});
