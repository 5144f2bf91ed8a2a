import { signal } from '@preact/signals';
import { Icon } from './icon.js';

export type ToastKind = 'info' | 'success' | 'warning' | 'error';

export interface Toast {
  id: number;
  message: string;
  kind: ToastKind;
}

const DEFAULT_DURATION_MS = 5000;

const ICONS: Record<ToastKind, string> = {
  info: 'info',
  success: 'check_circle',
  warning: 'wifi_off',
  error: 'error',
};

// ─── Shared state ─────────────────────────────────────────────────────

export const toasts = signal<Toast[]>([]);
let nextToastId = 0;

// ─── Imperative API (used by main.ts and the controllers) ─────────────

/** Show a toast. A duration of 0 keeps it until dismissed. */
export function showToast(message: string, kind: ToastKind = 'info', durationMs = DEFAULT_DURATION_MS): number {
  const id = nextToastId++;
  toasts.value = [...toasts.value, { id, message, kind }];
  if (durationMs > 0) {
    setTimeout(() => dismissToast(id), durationMs);
  }
  return id;
}

export function dismissToast(id: number): void {
  toasts.value = toasts.value.filter((t) => t.id !== id);
}

// ─── Component ────────────────────────────────────────────────────────

export function ToastStack() {
  if (toasts.value.length === 0) return null;

  return (
    <div class="toast-stack" role="status" aria-live="polite">
      {toasts.value.map((toast) => (
        <div key={toast.id} class={`toast toast-${toast.kind}`}>
          <Icon name={ICONS[toast.kind]} />
          <span class="toast-message">{toast.message}</span>
          <button
            type="button"
            class="toast-close"
            aria-label="Dismiss"
            onClick={() => dismissToast(toast.id)}
          >
            ✕
          </button>
        </div>
      ))}
    </div>
  );
}
