import { LivenessRelay } from './liveness-relay';

describe('LivenessRelay', () => {
  it('returns queued identifiers in FIFO order', async () => {
    const relay = new LivenessRelay();
    relay.enqueue(3);
    relay.enqueue(1);
    relay.enqueue(2);

    expect(relay.size).toBe(3);
    expect(await relay.dequeue(10)).toBe(3);
    expect(await relay.dequeue(10)).toBe(1);
    expect(await relay.dequeue(10)).toBe(2);
    expect(relay.size).toBe(0);
  });

  it('resolves null when nothing arrives before the timeout', async () => {
    const relay = new LivenessRelay();

    await expect(relay.dequeue(5)).resolves.toBeNull();
  });

  it('wakes a waiting dequeue when an identifier is enqueued', async () => {
    const relay = new LivenessRelay();
    const pending = relay.dequeue(5_000);

    relay.enqueue(42);

    await expect(pending).resolves.toBe(42);
    expect(relay.size).toBe(0);
  });

  it('serves concurrent waiters in the order they started waiting', async () => {
    const relay = new LivenessRelay();
    const first = relay.dequeue(5_000);
    const second = relay.dequeue(5_000);

    relay.enqueue(1);
    relay.enqueue(2);

    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
  });

  it('resolves null as soon as the signal aborts', async () => {
    const relay = new LivenessRelay();
    const controller = new AbortController();
    const pending = relay.dequeue(5_000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeNull();
  });

  it('does not lose an identifier enqueued after an aborted wait', async () => {
    const relay = new LivenessRelay();
    const controller = new AbortController();
    controller.abort();

    await expect(relay.dequeue(5_000, controller.signal)).resolves.toBeNull();
    relay.enqueue(9);
    await expect(relay.dequeue(10)).resolves.toBe(9);
  });
});
