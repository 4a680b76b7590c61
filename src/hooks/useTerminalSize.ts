import { useEffect } from 'react';
import { useStdout } from 'ink';
import type { Viewport } from '../types';

export function readViewport(stream: { rows?: number; columns?: number }, fallback: Viewport): Viewport {
  return {
    rows: stream.rows && stream.rows > 0 ? stream.rows : fallback.rows,
    columns: stream.columns && stream.columns > 0 ? stream.columns : fallback.columns,
  };
}

/**
 * Report the terminal size whenever stdout is resized.
 */
export function useTerminalSize(current: Viewport, onResize: (viewport: Viewport) => void): void {
  const { stdout } = useStdout();

  useEffect(() => {
    const handleResize = () => {
      onResize(readViewport(stdout, current));
    };
    stdout.on('resize', handleResize);
    return () => {
      stdout.off('resize', handleResize);
    };
  }, [stdout, current, onResize]);
}
