import createDebug from "debug";
import type { PushSubscriptionLike, RegistrationLike } from "./sw-types.js";

const log = createDebug("offline-shell:push");

/** The static side of the browser `Notification` API. */
export interface NotificationPermissionApi {
  readonly permission: string;
  requestPermission(): Promise<string>;
}

export interface PushSetupOptions {
  /** Undefined in browsers without notifications. */
  notifications: NotificationPermissionApi | undefined;
  ready: () => Promise<RegistrationLike>;
  publicKey?: string;
}

/** Decode a base64url VAPID key into the bytes `pushManager.subscribe` expects. */
export function decodeBase64Url(value: string) {
  const padding = "=".repeat((4 - (value.length % 4)) % 4);
  const base64 = (value + padding).replace(/-/g, "+").replace(/_/g, "/");
  const raw = atob(base64);
  const bytes = new Uint8Array(raw.length);
  for (let i = 0; i < raw.length; i++) {
    bytes[i] = raw.charCodeAt(i);
  }
  return bytes;
}

/**
 * Return the existing push subscription, or create one. Never creates a
 * second subscription. Resolves null when push is unavailable or no public
 * key is configured.
 */
export async function ensurePushSubscription(
  registration: RegistrationLike,
  publicKey: string | undefined,
): Promise<PushSubscriptionLike | null> {
  const pushManager = registration.pushManager;
  if (!pushManager) {
    log("push not supported");
    return null;
  }

  const existing = await pushManager.getSubscription();
  if (existing) {
    log("already subscribed");
    return existing;
  }

  if (!publicKey) {
    log("no push public key configured, skipping subscription");
    return null;
  }

  const subscription = await pushManager.subscribe({
    userVisibleOnly: true,
    applicationServerKey: decodeBase64Url(publicKey),
  });
  log("subscribed %s", subscription.endpoint);
  return subscription;
}

/** Ask for notification permission; on grant make sure a push subscription exists. */
export async function requestNotifications(options: PushSetupOptions): Promise<boolean> {
  const { notifications } = options;
  if (!notifications) {
    log("notifications not supported");
    return false;
  }

  const permission = await notifications.requestPermission();
  if (permission !== "granted") {
    return false;
  }

  log("notification permission granted");
  await subscribeSafely(options);
  return true;
}

/** On page load: if permission was granted earlier, make sure the subscription is still there. */
export async function restorePushSubscription(options: PushSetupOptions): Promise<void> {
  if (options.notifications?.permission !== "granted") {
    return;
  }
  await subscribeSafely(options);
}

async function subscribeSafely(options: PushSetupOptions): Promise<void> {
  try {
    const registration = await options.ready();
    await ensurePushSubscription(registration, options.publicKey);
  } catch (err) {
    console.error("Push subscription failed:", err);
  }
}
