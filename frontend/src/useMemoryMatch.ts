import React from 'react';
import type { GameSnapshot } from '@memory-match/shared';
import type { MemoryMatchSession } from '@memory-match/engine';

export const useMemoryMatch = (session: MemoryMatchSession): GameSnapshot =>
  React.useSyncExternalStore(session.subscribe, session.getSnapshot);
