import { Box, Text } from 'ink';
import type { ReactNode } from 'react';
import type { KeyHint } from '../app/snapshot.js';
import type { ClockStyle } from '../types/index.js';
import { renderProgressBar } from './glyphs.js';
import { colors, selectStyles } from './theme.js';

export function Header({ title, subtitle }: { title: string; subtitle: string | null }): ReactNode {
  return (
    <Box width="100%" flexDirection="row" justifyContent="space-between" borderStyle="round" borderColor={colors.border}>
      <Text color={colors.text}>{title.toUpperCase()}</Text>
      {subtitle ? <Text color={colors.textDim}>{subtitle}</Text> : null}
    </Box>
  );
}

export function KeyHintsRow({ hints }: { hints: KeyHint[] }): ReactNode {
  return (
    <Box flexDirection="row" gap={3} justifyContent="center">
      {hints.map(({ key, description }) => (
        <Box key={`${key}-${description}`} flexDirection="row" gap={1}>
          <Text color={colors.text}>{`[${key}]`}</Text>
          <Text color={colors.textDim}>{description}</Text>
        </Box>
      ))}
    </Box>
  );
}

export function StatusItem({ label, value, valueColor = colors.textMuted }: {
  label: string;
  value: string;
  valueColor?: string;
}): ReactNode {
  return (
    <Box flexDirection="row" gap={1}>
      <Text color={colors.textDim}>{label}</Text>
      <Text color={valueColor}>{value}</Text>
    </Box>
  );
}

export function MessageBox({ message, type = 'info' }: {
  message: string;
  type?: 'info' | 'error';
}): ReactNode {
  const typeColors = {
    info: colors.textMuted,
    error: colors.error,
  };

  const typeIcons = {
    info: '.',
    error: 'x',
  };

  return (
    <Box flexDirection="row" gap={1} paddingX={1} borderStyle="round" borderColor={colors.border}>
      <Text color={typeColors[type]}>{typeIcons[type]}</Text>
      <Text color={colors.text}>{message}</Text>
    </Box>
  );
}

export function Menu({ items, selected }: { items: string[]; selected: number }): ReactNode {
  return (
    <Box flexDirection="column" paddingX={1} borderStyle="round" borderColor={colors.borderFocused}>
      {items.map((item, index) =>
        index === selected ? (
          <Text key={item} color={selectStyles.selectedFg} backgroundColor={selectStyles.selectedBg}>
            {` ${item} `}
          </Text>
        ) : (
          <Text key={item} color={colors.textMuted}>{` ${item} `}</Text>
        )
      )}
    </Box>
  );
}

export function ProgressBar({ percent, width, style }: { percent: number; width: number; style: ClockStyle }): ReactNode {
  return (
    <Box flexDirection="row" gap={1}>
      <Text color={colors.textMuted}>{renderProgressBar(percent, width, style)}</Text>
      <Text color={colors.textDim}>{`${percent}%`}</Text>
    </Box>
  );
}
