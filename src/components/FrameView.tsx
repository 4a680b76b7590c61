import { Box, Text } from 'ink';
import type { Frame } from '../lib/sessionFrame';

interface FrameViewProps {
  frame: Frame;
  width: number;
}

export function FrameView({ frame, width }: FrameViewProps) {
  return (
    <Box flexDirection="column" width={width}>
      {frame.lines.map((line, index) => (
        <Box key={index} justifyContent={line.align === 'center' ? 'center' : 'flex-start'}>
          <Text color={frame.palette[line.slot]} bold={line.bold}>
            {line.text || ' '}
          </Text>
        </Box>
      ))}
    </Box>
  );
}
