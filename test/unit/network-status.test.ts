import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { NetworkStatusObserver, OFFLINE_MESSAGE } from '../../src/client/network-status.js';
import type { RegistrationLike, SyncManagerLike } from '../../src/client/sw-types.js';
import type { ToastKind } from '../../src/client/ui/toasts.js';

function registrationWith(sync?: SyncManagerLike): RegistrationLike {
  return {
    scope: 'https://app.test/',
    installing: null,
    waiting: null,
    active: null,
    sync,
    update: async () => undefined,
    addEventListener: () => {},
  };
}

describe('NetworkStatusObserver', () => {
  let target: EventTarget;
  let sync: { register: Mock<(tag: string) => Promise<void>> };
  let notify: Mock<(message: string, kind: ToastKind) => void>;
  let observer: NetworkStatusObserver;

  beforeEach(() => {
    target = new EventTarget();
    sync = { register: vi.fn(async (_tag: string) => {}) };
    notify = vi.fn<(message: string, kind: ToastKind) => void>();
    observer = new NetworkStatusObserver({
      target,
      ready: async () => registrationWith(sync),
      syncTag: 'sync-tasks',
      notify,
    });
    observer.start();
  });

  afterEach(() => {
    observer.stop();
    vi.restoreAllMocks();
  });

  it('warns when the connection drops', () => {
    target.dispatchEvent(new Event('offline'));

    expect(notify).toHaveBeenCalledWith(OFFLINE_MESSAGE, 'warning');
    expect(OFFLINE_MESSAGE).toBe('No internet connection. Working in offline mode.');
  });

  it('requests a background sync when the connection returns', async () => {
    target.dispatchEvent(new Event('online'));

    await vi.waitFor(() => expect(sync.register).toHaveBeenCalledWith('sync-tasks'));
    expect(notify).not.toHaveBeenCalled();
  });

  it('stops listening after stop', async () => {
    observer.stop();

    target.dispatchEvent(new Event('offline'));
    target.dispatchEvent(new Event('online'));
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(notify).not.toHaveBeenCalled();
    expect(sync.register).not.toHaveBeenCalled();
  });

  it('does not register listeners twice', () => {
    observer.start();

    target.dispatchEvent(new Event('offline'));

    expect(notify).toHaveBeenCalledTimes(1);
  });

  describe('requestSync', () => {
    it('resolves true once the tag is registered', async () => {
      expect(await observer.requestSync()).toBe(true);
      expect(sync.register).toHaveBeenCalledTimes(1);
    });

    it('resolves false without background sync support', async () => {
      const unsupported = new NetworkStatusObserver({
        target,
        ready: async () => registrationWith(undefined),
        syncTag: 'sync-tasks',
        notify,
      });

      expect(await unsupported.requestSync()).toBe(false);
    });

    it('logs and resolves false when registration is refused', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      sync.register.mockRejectedValueOnce(new Error('NotAllowedError'));

      expect(await observer.requestSync()).toBe(false);
      expect(warn).toHaveBeenCalledWith('Background sync registration failed:', expect.any(Error));
    });
  });
});
