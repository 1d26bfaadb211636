import { describe, it, expect, vi } from 'vitest';

describe('index', () => {
  it('le chargement du module ne lance aucun calcul', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    try {
      const api = await import('@/index');
      expect(log).not.toHaveBeenCalled();
      expect('lineStore' in api).toBe(false);
      expect(typeof api.createLineStore).toBe('function');
    } finally {
      log.mockRestore();
    }
  });
});
