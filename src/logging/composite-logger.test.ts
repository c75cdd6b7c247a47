import { describe, it, expect } from 'vitest';
import { CompositeLogger } from './composite-logger';
import { BufferLogger } from './buffer-logger';
import { MockClock } from '../types/clock';

describe('CompositeLogger', () => {
  const clock = new MockClock();

  it('should forward every event to each delegate', () => {
    const first = new BufferLogger({ clock });
    const second = new BufferLogger({ clock, minLevel: 'warn' });
    const logger = new CompositeLogger([first, second], { clock });

    logger.info('Started web');
    logger.error('Failed to start db');

    expect(first.getEvents().map((e) => e.message)).toEqual(['Started web', 'Failed to start db']);
    expect(second.getEvents().map((e) => e.message)).toEqual(['Failed to start db']);
  });

  it('should record events logged through children', () => {
    const delegate = new BufferLogger({ clock });
    const logger = new CompositeLogger([delegate], { clock });

    logger.child({ container: 'web' }).event('container_started', 'Started web');
    logger.info('Summary');

    expect(logger.getEvents().map((e) => [e.eventType, e.message, e.metadata])).toEqual([
      ['container_started', 'Started web', { container: 'web' }],
      ['info', 'Summary', {}],
    ]);
    expect(delegate.getEvents().map((e) => e.metadata)).toEqual([{ container: 'web' }, {}]);
  });
});
