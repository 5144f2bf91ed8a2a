import { render, h } from 'preact';
import 'material-symbols/outlined.css';
import { defineShellConfig } from '../shared/shell-config.js';
import { InstallPromptController, isInstallPromptEvent, type InstallOutcome } from './install-prompt.js';
import { NetworkStatusObserver } from './network-status.js';
import { requestNotifications, restorePushSubscription, type PushSetupOptions } from './push.js';
import { RegistrationController } from './registration-controller.js';
import { WorkerBridge } from './worker-bridge.js';
import { InstallButton } from './ui/install-button.js';
import { ToastStack, showToast } from './ui/toasts.js';

/** Helpers exposed to page scripts and the console. */
export interface PwaApi {
  isStandalone: () => boolean;
  requestNotifications: () => Promise<boolean>;
  /** Resolves with the deleted partition names, or null when no worker controls the page. */
  clearCache: () => Promise<string[] | null>;
  showInstallPrompt: () => Promise<InstallOutcome | null>;
}

declare global {
  interface Window {
    PWA?: PwaApi;
  }
}

function readMeta(name: string): string | undefined {
  return document.querySelector<HTMLMetaElement>(`meta[name="${name}"]`)?.content || undefined;
}

function isStandalone(): boolean {
  return (
    window.matchMedia('(display-mode: standalone)').matches ||
    ('standalone' in navigator && navigator.standalone === true)
  );
}

// ─── UI ───────────────────────────────────────────────────────────────

const installPrompt = new InstallPromptController();

function mountUi(): void {
  const root = document.createElement('div');
  root.id = 'pwa-root';
  document.body.appendChild(root);
  render(
    h('div', null, h(InstallButton, { controller: installPrompt }), h(ToastStack, {})),
    root,
  );
}

// ─── Service Worker ───────────────────────────────────────────────────

if ('serviceWorker' in navigator) {
  const config = defineShellConfig({ pushPublicKey: readMeta('push-public-key') });
  const container = navigator.serviceWorker;
  const bridge = new WorkerBridge(container);

  const registration = new RegistrationController({
    container,
    bridge,
    config,
    confirmUpdate: () => window.confirm('A new version of the app is available. Update now?'),
    reload: () => window.location.reload(),
    onError: () => showToast('Offline support is unavailable in this browser session.', 'error'),
  });

  const network = new NetworkStatusObserver({
    target: window,
    ready: () => container.ready,
    syncTag: config.syncTag,
    notify: (message, kind) => showToast(message, kind),
  });

  const pushOptions: PushSetupOptions = {
    notifications: 'Notification' in window ? Notification : undefined,
    ready: () => container.ready,
    publicKey: config.pushPublicKey,
  };

  // The worker asks open pages to flush their queued task writes.
  bridge.onEvent((event) => {
    if (event.type === 'SYNC_REQUESTED') {
      window.dispatchEvent(new CustomEvent('pwa:sync', { detail: { tag: event.tag } }));
    }
  });

  window.addEventListener('beforeinstallprompt', (event) => {
    if (isInstallPromptEvent(event)) {
      installPrompt.capture(event);
    }
  });

  window.addEventListener('appinstalled', () => {
    installPrompt.markInstalled();
    showToast('App installed successfully!', 'success');
  });

  network.start();

  window.addEventListener('load', () => {
    mountUi();
    registration.start().catch((err) => {
      console.error('Failed to start service worker registration:', err);
    });
    restorePushSubscription(pushOptions).catch((err) => {
      console.error('Failed to restore push subscription:', err);
    });
  });

  window.PWA = {
    isStandalone,
    requestNotifications: () => requestNotifications(pushOptions),
    clearCache: () => bridge.clearCaches(),
    showInstallPrompt: () => installPrompt.trigger(),
  };
}
