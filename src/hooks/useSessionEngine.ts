import { useCallback, useEffect, useRef, useState } from 'react';
import { runSessionEffect } from '../lib/sessionEffects';
import type { EffectDeps } from '../lib/sessionEffects';
import { reduceSession } from '../lib/sessionState';
import type { Session, SessionEvent, TransitionEnv } from '../lib/sessionState';

interface UseSessionEngineOptions {
  initialSession: Session;
  deps: EffectDeps;
  env: TransitionEnv;
  tickMs: number;
}

/**
 * Holds the session, feeds events through the reducer and runs the effects it
 * returns. Ticks are only scheduled while the boss overlay is showing.
 */
export function useSessionEngine({ initialSession, deps, env, tickMs }: UseSessionEngineOptions) {
  const [session, setSession] = useState(initialSession);
  const sessionRef = useRef(initialSession);
  const depsRef = useRef(deps);
  const envRef = useRef(env);

  useEffect(() => {
    depsRef.current = deps;
    envRef.current = env;
  }, [deps, env]);

  const dispatch: (event: SessionEvent) => void = useCallback((event: SessionEvent) => {
    const { session: next, effects } = reduceSession(sessionRef.current, event, envRef.current);
    sessionRef.current = next;
    setSession(next);

    for (const effect of effects) {
      runSessionEffect(effect, next, depsRef.current, dispatch).catch((err) => {
        console.error(`Session effect "${effect.type}" failed:`, err);
      });
    }
  }, []);

  const isBoss = session.mode.screen === 'boss';

  useEffect(() => {
    if (!isBoss) {
      return;
    }
    const timer = setInterval(() => {
      dispatch({ type: 'tick' });
    }, tickMs);
    return () => clearInterval(timer);
  }, [dispatch, isBoss, tickMs]);

  return { session, dispatch };
}
