import { useCallback, useMemo } from 'react';
import { useApp, useInput } from 'ink';
import { FrameView } from './FrameView';
import { useSessionEngine } from '../hooks/useSessionEngine';
import { useTerminalSize } from '../hooks/useTerminalSize';
import { normalizeKeys } from '../lib/keyBindings';
import { buildFrame } from '../lib/sessionFrame';
import type { EffectDeps } from '../lib/sessionEffects';
import type { Session, TransitionEnv } from '../lib/sessionState';
import type { Viewport } from '../types';

export type AppServices = Omit<EffectDeps, 'exit'>;

interface AppProps {
  initialSession: Session;
  services: AppServices;
  env: TransitionEnv;
  tickMs: number;
  onQuit?: () => void;
}

export function App({ initialSession, services, env, tickMs, onQuit }: AppProps) {
  const { exit } = useApp();

  const deps = useMemo<EffectDeps>(() => ({
    ...services,
    exit: () => {
      onQuit?.();
      exit();
    },
  }), [services, onQuit, exit]);

  const { session, dispatch } = useSessionEngine({ initialSession, deps, env, tickMs });

  useInput((input, key) => {
    for (const name of normalizeKeys(input, key)) {
      dispatch({ type: 'key', key: name });
    }
  });

  const handleResize = useCallback((viewport: Viewport) => {
    dispatch({ type: 'resize', viewport });
  }, [dispatch]);
  useTerminalSize(session.viewport, handleResize);

  const frame = useMemo(() => buildFrame(session, session.viewport), [session]);

  return <FrameView frame={frame} width={session.viewport.columns} />;
}
