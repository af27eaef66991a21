import { describe, expect, it } from 'vitest';
import { createProgressReporter } from './progress';

describe('createProgressReporter', () => {
  it('writes each new percentage once and ends the line at 100%', () => {
    const written: string[] = [];
    const report = createProgressReporter((text) => written.push(text));

    report(20, 100);
    report(20, 100);
    report(21, 100);
    report(100, 100);

    expect(written).toEqual(['\rUploading: 20%', '\rUploading: 21%', '\rUploading: 100%', '\n']);
  });

  it('rounds down', () => {
    const written: string[] = [];
    const report = createProgressReporter((text) => written.push(text));
    report(2, 3);
    expect(written).toEqual(['\rUploading: 66%']);
  });
});
