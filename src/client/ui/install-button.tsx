import { useEffect, useState } from 'preact/hooks';
import type { InstallPromptController } from '../install-prompt.js';
import { Icon } from './icon.js';

interface InstallButtonProps {
  controller: InstallPromptController;
}

/** Floating install control, shown only while an install offer is pending. */
export function InstallButton({ controller }: InstallButtonProps) {
  const [available, setAvailable] = useState(controller.available);

  useEffect(() => {
    setAvailable(controller.available);
    return controller.onChange(setAvailable);
  }, [controller]);

  if (!available) return null;

  const handleClick = () => {
    controller.trigger().catch((err) => {
      console.error('Install prompt failed:', err);
    });
  };

  return (
    <button id="pwa-install-btn" type="button" class="install-btn" onClick={handleClick}>
      <Icon name="download" />
      Install app
    </button>
  );
}
