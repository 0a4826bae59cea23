const PAGE_DIGITS = 3;

export type DigitResult =
  | { type: 'pending'; buffer: string }
  | { type: 'complete'; number: number }
  | { type: 'rejected'; buffer: string };

/**
 * Buffers keyboard digits until a 3-digit page number is complete. Page numbers
 * start at 100, so a leading zero is rejected instead of buffered.
 */
export class PageNumberInput {
  private digits: number[] = [];

  get buffer(): string {
    return this.digits.join('');
  }

  /** Header form of the entry in progress, e.g. `P12-`; null when nothing is typed. */
  get display(): string | null {
    if (this.digits.length === 0) {
      return null;
    }
    return `P${this.buffer.padEnd(PAGE_DIGITS, '-')}`;
  }

  pushDigit(digit: number): DigitResult {
    if (!Number.isInteger(digit) || digit < 0 || digit > 9) {
      return { type: 'rejected', buffer: this.buffer };
    }
    if (this.digits.length === 0 && digit === 0) {
      return { type: 'rejected', buffer: this.buffer };
    }
    this.digits.push(digit);
    if (this.digits.length < PAGE_DIGITS) {
      return { type: 'pending', buffer: this.buffer };
    }
    const number = Number.parseInt(this.buffer, 10);
    this.digits = [];
    return { type: 'complete', number };
  }

  clear(): void {
    this.digits = [];
  }
}
