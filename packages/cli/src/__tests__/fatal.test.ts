import { describe, it, expect, afterEach, vi } from 'vitest';
import { EngineError } from '@gdfmt/core';
import { reportFatal } from '../fatal';
import { CLIError, EXIT_CODE } from '../index';

describe('reportFatal', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the exit code a CLIError carries', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(reportFatal(new CLIError('bad flag', EXIT_CODE.UNFORMATTED))).toBe(EXIT_CODE.UNFORMATTED);
    expect(error).toHaveBeenCalledWith('gdfmt: bad flag');
  });

  it('names the stage of a formatting failure', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(reportFatal(new EngineError('topiary not found', 'topiary'))).toBe(EXIT_CODE.RUNTIME_ERROR);
    expect(error).toHaveBeenCalledWith('gdfmt: engine failed: Engine error (topiary): topiary not found');
  });

  it('flattens other errors onto one line', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(reportFatal(new Error('first\n  second'))).toBe(EXIT_CODE.RUNTIME_ERROR);
    expect(reportFatal('plain')).toBe(EXIT_CODE.RUNTIME_ERROR);
    expect(error).toHaveBeenNthCalledWith(1, 'gdfmt: first second');
    expect(error).toHaveBeenNthCalledWith(2, 'gdfmt: plain');
  });
});
