import { DependencyHealthManager } from '../../src/resilience/dependency-health';

describe('DependencyHealthManager', () => {
  let nowMs: number;
  let health: DependencyHealthManager;

  beforeEach(() => {
    nowMs = 0;
    health = new DependencyHealthManager(4, 1000, () => nowMs);
  });

  it('should start healthy', () => {
    expect(health.isAvailable('store')).toBe(true);
    expect(health.getDegradationLevel()).toBe('none');
    expect(health.getHealthSummary()).toEqual({
      store: { status: 'healthy', circuitOpen: false, failures: 0 },
      source: { status: 'healthy', circuitOpen: false, failures: 0 },
    });
  });

  it('should degrade at half the threshold and open the circuit at the threshold', () => {
    health.recordFailure('store', 'timeout');
    expect(health.getStatus('store')?.status).toBe('healthy');

    health.recordFailure('store', 'timeout');
    expect(health.getStatus('store')?.status).toBe('degraded');
    expect(health.getDegradationLevel()).toBe('partial');

    health.recordFailure('store', 'timeout');
    health.recordFailure('store', 'timeout');
    expect(health.getStatus('store')).toMatchObject({ status: 'down', circuitOpen: true, lastError: 'timeout' });
    expect(health.isAvailable('store')).toBe(false);
    expect(health.isAvailable('source')).toBe(true);
  });

  it('should half-open after the reset window', () => {
    for (let i = 0; i < 4; i++) health.recordFailure('store', 'timeout');

    nowMs = 1000;
    expect(health.isAvailable('store')).toBe(false);

    nowMs = 1001;
    expect(health.isAvailable('store')).toBe(true);
    expect(health.getStatus('store')?.status).toBe('degraded');
  });

  it('should close the circuit on success', () => {
    for (let i = 0; i < 4; i++) health.recordFailure('source', 'refused');

    health.recordSuccess('source');

    expect(health.isAvailable('source')).toBe(true);
    expect(health.getStatus('source')).toMatchObject({ status: 'healthy', consecutiveFailures: 0, circuitOpen: false });
  });

  it('should report full degradation when everything is down', () => {
    for (let i = 0; i < 4; i++) {
      health.recordFailure('store', 'timeout');
      health.recordFailure('source', 'refused');
    }
    expect(health.getDegradationLevel()).toBe('full');
  });
});
