import { useMemo, useSyncExternalStore } from 'react';
import type { NavigationController, NavigationSnapshot } from '../navigation/controller.js';

export function useNavigationSnapshot(controller: NavigationController): NavigationSnapshot {
  const subscribe = useMemo(() => controller.subscribe.bind(controller), [controller]);
  return useSyncExternalStore(subscribe, () => controller.getSnapshot(), () => controller.getSnapshot());
}
