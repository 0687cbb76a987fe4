import { describe, it, expect, vi } from 'vitest';
import { createTaggedLogger } from '../../src/core-engine/GameLogger';

function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
}

describe('createTaggedLogger', () => {
  it('should drop debug and info output by default', () => {
    const target = spyLogger();
    const log = createTaggedLogger('Test', target);
    log.debug('hidden');
    log.info('hidden');
    expect(target.debug).not.toHaveBeenCalled();
    expect(target.info).not.toHaveBeenCalled();
  });

  it('should prefix lines with the tag when verbose', () => {
    const target = spyLogger();
    const log = createTaggedLogger('Test', target, true);
    log.debug('board ready', 3);
    log.info('done');
    expect(target.debug).toHaveBeenCalledWith('[Test]', 'board ready', 3);
    expect(target.info).toHaveBeenCalledWith('[Test]', 'done');
  });

  it('should always pass warnings through', () => {
    const target = spyLogger();
    createTaggedLogger('Test', target).warn('careful');
    expect(target.warn).toHaveBeenCalledWith('[Test]', 'careful');
  });
});
