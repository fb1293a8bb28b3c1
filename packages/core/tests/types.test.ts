import { describe, expect, it, vi } from 'vitest';

import { disposeValue, isDisposable } from '../src/types/types.js';

describe('isDisposable', () => {
  it('accepts values with a dispose or close hook', () => {
    expect(isDisposable({ dispose: () => undefined })).toBe(true);
    expect(isDisposable({ close: () => undefined })).toBe(true);
    expect(isDisposable(Object.assign(() => undefined, { dispose: () => undefined }))).toBe(true);
  });

  it('rejects plain values and already disposed ones', () => {
    expect(isDisposable(null)).toBe(false);
    expect(isDisposable('text')).toBe(false);
    expect(isDisposable({ dispose: 'no' })).toBe(false);
    expect(isDisposable({ dispose: () => undefined, isDisposed: true })).toBe(false);
  });
});

describe('disposeValue', () => {
  it('prefers dispose over close', () => {
    const dispose = vi.fn();
    const close = vi.fn();

    disposeValue({ dispose, close });

    expect(dispose).toHaveBeenCalledTimes(1);
    expect(close).not.toHaveBeenCalled();
  });

  it('falls back to close and keeps the receiver', () => {
    const resource = {
      closed: false,
      close() {
        this.closed = true;
      },
    };

    disposeValue(resource);

    expect(resource.closed).toBe(true);
  });
});
