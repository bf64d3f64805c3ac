import { describe, it, expect, vi } from 'vitest';
import { ProgressReporter } from '../src/observability/progress-reporter.js';

describe('ProgressReporter', () => {
  it('should deliver phase and message to the callback', () => {
    const reporter = new ProgressReporter();
    const callback = vi.fn();
    reporter.setCallback(callback);

    reporter.report('research', 'Researching "diabetes"...');

    expect(callback).toHaveBeenCalledWith('research', 'Researching "diabetes"...');
  });

  it('should do nothing without a callback', () => {
    const reporter = new ProgressReporter();

    expect(() => reporter.report('saving', 'Saving outputs...')).not.toThrow();
    expect(reporter.getCallback()).toBeNull();
  });

  it('should swallow errors thrown by the callback', () => {
    const reporter = new ProgressReporter();
    reporter.setCallback(() => {
      throw new Error('ui went away');
    });

    expect(() => reporter.report('complete', 'done')).not.toThrow();
  });

  it('should stop delivering after the callback is cleared', () => {
    const reporter = new ProgressReporter();
    const callback = vi.fn();
    reporter.setCallback(callback);
    reporter.setCallback(null);

    reporter.report('writing', 'Writing...');

    expect(callback).not.toHaveBeenCalled();
  });
});
