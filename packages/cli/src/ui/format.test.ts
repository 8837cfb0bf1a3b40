import { describe, expect, it } from 'vitest';
import { formatProgressBar, formatTable } from './format.js';

describe('formatProgressBar', () => {
  it('should fill in proportion to the percentage', () => {
    expect(formatProgressBar(60, 10)).toBe('██████░░░░  60%');
    expect(formatProgressBar(33.9)).toBe(`${'█'.repeat(8)}${'░'.repeat(16)}  33%`);
  });

  it('should clamp out-of-range values', () => {
    expect(formatProgressBar(-5, 4)).toBe('░░░░   0%');
    expect(formatProgressBar(150, 4)).toBe('████ 100%');
  });
});

describe('formatTable', () => {
  it('should pad columns to their widest cell', () => {
    expect(
      formatTable(
        ['ID', 'Name'],
        [
          ['1', 'alpha'],
          ['22', 'b'],
        ],
      ),
    ).toEqual(['ID  Name', '--  -----', '1   alpha', '22  b']);
  });

  it('should render the header alone for no rows', () => {
    expect(formatTable(['Window', 'Score'], [])).toEqual(['Window  Score', '------  -----']);
  });
});
