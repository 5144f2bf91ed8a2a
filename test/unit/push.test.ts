import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  decodeBase64Url,
  ensurePushSubscription,
  requestNotifications,
  restorePushSubscription,
  type NotificationPermissionApi,
} from '../../src/client/push.js';
import type {
  PushManagerLike,
  PushSubscribeOptions,
  PushSubscriptionLike,
  RegistrationLike,
} from '../../src/client/sw-types.js';

const PUBLIC_KEY = 'AQID';

class FakePushManager implements PushManagerLike {
  current: PushSubscriptionLike | null = null;
  readonly subscribe = vi.fn(async (_options: PushSubscribeOptions): Promise<PushSubscriptionLike> => {
    this.current = { endpoint: 'https://push.test/subscription/1' };
    return this.current;
  });

  async getSubscription(): Promise<PushSubscriptionLike | null> {
    return this.current;
  }
}

function registrationWith(pushManager?: PushManagerLike): RegistrationLike {
  return {
    scope: 'https://app.test/',
    installing: null,
    waiting: null,
    active: null,
    pushManager,
    update: async () => undefined,
    addEventListener: () => {},
  };
}

function notificationsWith(permission: string, answer = permission) {
  return {
    permission,
    requestPermission: vi.fn(async () => answer),
  } satisfies NotificationPermissionApi;
}

describe('decodeBase64Url', () => {
  it('decodes unpadded base64url', () => {
    expect([...decodeBase64Url('AQID')]).toEqual([1, 2, 3]);
    expect([...decodeBase64Url('-_8')]).toEqual([251, 255]);
  });
});

describe('ensurePushSubscription', () => {
  let pushManager: FakePushManager;

  beforeEach(() => {
    pushManager = new FakePushManager();
  });

  it('subscribes with the decoded application server key', async () => {
    const subscription = await ensurePushSubscription(registrationWith(pushManager), PUBLIC_KEY);

    expect(subscription?.endpoint).toBe('https://push.test/subscription/1');
    expect(pushManager.subscribe).toHaveBeenCalledTimes(1);
    const [options] = pushManager.subscribe.mock.calls[0];
    expect(options.userVisibleOnly).toBe(true);
    expect(options.applicationServerKey).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('reuses an existing subscription', async () => {
    const registration = registrationWith(pushManager);

    const first = await ensurePushSubscription(registration, PUBLIC_KEY);
    const second = await ensurePushSubscription(registration, PUBLIC_KEY);

    expect(second).toBe(first);
    expect(pushManager.subscribe).toHaveBeenCalledTimes(1);
  });

  it('returns an existing subscription even without a key', async () => {
    pushManager.current = { endpoint: 'https://push.test/subscription/0' };

    const subscription = await ensurePushSubscription(registrationWith(pushManager), undefined);

    expect(subscription?.endpoint).toBe('https://push.test/subscription/0');
  });

  it('skips subscribing without a public key', async () => {
    expect(await ensurePushSubscription(registrationWith(pushManager), undefined)).toBeNull();
    expect(pushManager.subscribe).not.toHaveBeenCalled();
  });

  it('returns null when push is unsupported', async () => {
    expect(await ensurePushSubscription(registrationWith(undefined), PUBLIC_KEY)).toBeNull();
  });
});

describe('requestNotifications', () => {
  let pushManager: FakePushManager;

  beforeEach(() => {
    pushManager = new FakePushManager();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('subscribes once permission is granted', async () => {
    const notifications = notificationsWith('default', 'granted');

    const granted = await requestNotifications({
      notifications,
      ready: async () => registrationWith(pushManager),
      publicKey: PUBLIC_KEY,
    });

    expect(granted).toBe(true);
    expect(notifications.requestPermission).toHaveBeenCalledTimes(1);
    expect(pushManager.subscribe).toHaveBeenCalledTimes(1);
  });

  it('does not subscribe when permission is denied', async () => {
    const ready = vi.fn(async () => registrationWith(pushManager));

    const granted = await requestNotifications({
      notifications: notificationsWith('default', 'denied'),
      ready,
      publicKey: PUBLIC_KEY,
    });

    expect(granted).toBe(false);
    expect(ready).not.toHaveBeenCalled();
  });

  it('resolves false without notification support', async () => {
    expect(await requestNotifications({ notifications: undefined, ready: async () => registrationWith() })).toBe(false);
  });

  it('still reports the grant when subscribing fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    pushManager.subscribe.mockRejectedValueOnce(new Error('AbortError'));

    const granted = await requestNotifications({
      notifications: notificationsWith('default', 'granted'),
      ready: async () => registrationWith(pushManager),
      publicKey: PUBLIC_KEY,
    });

    expect(granted).toBe(true);
    expect(error).toHaveBeenCalledWith('Push subscription failed:', expect.any(Error));
  });
});

describe('restorePushSubscription', () => {
  it('re-subscribes when permission was granted earlier', async () => {
    const pushManager = new FakePushManager();

    await restorePushSubscription({
      notifications: notificationsWith('granted'),
      ready: async () => registrationWith(pushManager),
      publicKey: PUBLIC_KEY,
    });

    expect(pushManager.subscribe).toHaveBeenCalledTimes(1);
  });

  it('never asks for permission', async () => {
    const notifications = notificationsWith('default');
    const ready = vi.fn(async () => registrationWith());

    await restorePushSubscription({ notifications, ready, publicKey: PUBLIC_KEY });

    expect(notifications.requestPermission).not.toHaveBeenCalled();
    expect(ready).not.toHaveBeenCalled();
  });
});
