import { describe, expect, it } from 'vitest';
import { PageNumberInput } from './pageNumberInput.js';

describe('PageNumberInput', () => {
  it('completes after three digits and resets', () => {
    const input = new PageNumberInput();
    expect(input.pushDigit(1)).toEqual({ type: 'pending', buffer: '1' });
    expect(input.display).toBe('P1--');
    expect(input.pushDigit(2)).toEqual({ type: 'pending', buffer: '12' });
    expect(input.display).toBe('P12-');
    expect(input.pushDigit(5)).toEqual({ type: 'complete', number: 125 });
    expect(input.display).toBeNull();
    expect(input.buffer).toBe('');
  });

  it('rejects a leading zero and non-digits', () => {
    const input = new PageNumberInput();
    expect(input.pushDigit(0)).toEqual({ type: 'rejected', buffer: '' });
    input.pushDigit(3);
    expect(input.pushDigit(10)).toEqual({ type: 'rejected', buffer: '3' });
    expect(input.pushDigit(0)).toEqual({ type: 'pending', buffer: '30' });
  });

  it('clears a partial entry', () => {
    const input = new PageNumberInput();
    input.pushDigit(4);
    input.clear();
    expect(input.display).toBeNull();
  });
});
