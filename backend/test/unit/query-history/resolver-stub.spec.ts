import { describe, it, expect } from 'vitest';
import { ResolverStubController } from '../../../src/modules/query-history/resolver/resolver-stub.routes';

describe('ResolverStubController.delayMs', () => {
  it('maps random() linearly onto [min, max] seconds', () => {
    const values = [0, 0.5, 1];
    const controller = new ResolverStubController({
      minDelaySeconds: 1,
      maxDelaySeconds: 60,
      random: () => values.shift() ?? 0,
    });

    expect(controller.delayMs()).toBe(1000);
    expect(controller.delayMs()).toBe(30500);
    expect(controller.delayMs()).toBe(60000);
  });

  it('is zero when both bounds are zero', () => {
    const controller = new ResolverStubController({ minDelaySeconds: 0, maxDelaySeconds: 0 });
    expect(controller.delayMs()).toBe(0);
  });
});
