import { afterEach, describe, it, expect, vi } from 'vitest';
import { Logger } from '../src/utils/logger.js';

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('applies a later root level change to existing children', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const root = new Logger('warn');
    const child = root.child({ component: 'retriever' });

    child.info('retrieve.done');
    expect(log).not.toHaveBeenCalled();

    root.setLevel('debug');
    child.debug('retrieve.done', { hits: 2 });

    expect(log).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(log.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: 'debug', event: 'retrieve.done', component: 'retriever', hits: 2 });
  });

  it('keeps a level set on the child itself', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const root = new Logger('debug');
    const child = root.child({ component: 'http' });

    child.setLevel('silent');
    child.info('http.request');

    expect(child.level).toBe('silent');
    expect(root.level).toBe('debug');
    expect(log).not.toHaveBeenCalled();
  });
});
