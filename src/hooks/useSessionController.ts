'use client';

import { useEffect, useState, useSyncExternalStore } from 'react';
import { SessionController, createSessionController } from '@/lib/sessionController';

export function useSessionController(factory: () => SessionController = createSessionController) {
  const [controller] = useState(factory);
  const snapshot = useSyncExternalStore(
    controller.subscribe,
    controller.getSnapshot,
    controller.getSnapshot,
  );

  // Check if we have a saved session
  useEffect(() => {
    controller.restoreSession();
  }, [controller]);

  return { controller, snapshot };
}
