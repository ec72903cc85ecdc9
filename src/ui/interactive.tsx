import { Box, Text, useInput } from 'ink';
import type { ReactNode } from 'react';
import type { KeyInput } from '../types/index.js';
import type { EditView, RenderSnapshot } from '../app/snapshot.js';
import { bigTextWidth, renderBigText } from './glyphs.js';
import { toKeyInputs } from './keys.js';
import { colors, getClockColor } from './theme.js';
import { Header, KeyHintsRow, Menu, MessageBox, ProgressBar, StatusItem } from './components.js';
import { destroyUI, renderUI } from './react.js';

type KeyListener = (key: KeyInput) => void;

const MAX_PROGRESS_WIDTH = 40;

function InputBridge({ onKey }: { onKey: KeyListener }): ReactNode {
  useInput((input, key) => {
    for (const keyInput of toKeyInputs(input, key)) {
      onKey(keyInput);
    }
  });
  return null;
}

function BigClock({ text, style, color, columns }: {
  text: string;
  style: RenderSnapshot['style'];
  color: string;
  columns: number;
}): ReactNode {
  // Fall back to plain text when the digits do not fit
  if (bigTextWidth(text) > columns - 2) {
    return <Text color={color}>{text}</Text>;
  }
  return (
    <Box flexDirection="column" alignItems="center">
      {renderBigText(text, style).map((row, index) => (
        <Text key={index} color={color}>
          {row}
        </Text>
      ))}
    </Box>
  );
}

function EditPanel({ edit }: { edit: EditView }): ReactNode {
  switch (edit.kind) {
    case 'duration':
      return (
        <Box flexDirection="column" alignItems="center">
          <StatusItem label="edit" value={edit.field} valueColor={colors.text} />
          {edit.text ? <StatusItem label="input" value={edit.text} valueColor={colors.text} /> : null}
          {edit.error ? <MessageBox message={edit.error} type="error" /> : null}
        </Box>
      );
    case 'local-time':
      return (
        <Box flexDirection="column" alignItems="center">
          <StatusItem label="ends at" value={edit.value} valueColor={colors.text} />
          <StatusItem label="edit" value={edit.field} />
        </Box>
      );
    case 'event':
      return (
        <Box flexDirection="column" alignItems="center">
          <StatusItem
            label={edit.field === 'datetime' ? '> date' : '  date'}
            value={edit.datetime}
            valueColor={edit.field === 'datetime' ? colors.text : colors.textMuted}
          />
          <StatusItem
            label={edit.field === 'title' ? '> title' : '  title'}
            value={edit.title}
            valueColor={edit.field === 'title' ? colors.text : colors.textMuted}
          />
          {edit.error ? <MessageBox message={edit.error} type="error" /> : null}
        </Box>
      );
  }
}

export function ClockScreen({ snapshot, onKey }: { snapshot: RenderSnapshot; onKey: KeyListener }): ReactNode {
  const display = snapshot.edit?.kind === 'local-time' ? snapshot.edit.value : snapshot.display;
  const text = `${snapshot.sign ?? ''}${display}`;
  const color = getClockColor(snapshot.status);

  return (
    <Box flexDirection="column" width={snapshot.columns} padding={1}>
      <InputBridge onKey={onKey} />
      <Header title={snapshot.heading} subtitle={snapshot.localTime} />
      <Box flexDirection="column" alignItems="center" marginY={1}>
        {snapshot.flashVisible ? (
          <BigClock text={text} style={snapshot.style} color={color} columns={snapshot.columns} />
        ) : (
          <Text> </Text>
        )}
        <Text color={colors.textDim}>{snapshot.status}</Text>
        {snapshot.progress === null ? null : (
          <ProgressBar
            percent={snapshot.progress}
            width={Math.max(10, Math.min(MAX_PROGRESS_WIDTH, snapshot.columns - 12))}
            style={snapshot.style}
          />
        )}
      </Box>
      {snapshot.edit ? <EditPanel edit={snapshot.edit} /> : null}
      {snapshot.menu.open ? <Menu items={snapshot.menu.items} selected={snapshot.menu.selected} /> : null}
      {snapshot.notice ? <MessageBox message={snapshot.notice} type="error" /> : null}
      <KeyHintsRow hints={snapshot.hints} />
    </Box>
  );
}

export function showClockScreen(snapshot: RenderSnapshot, onKey: KeyListener): void {
  renderUI(process.stdout, <ClockScreen snapshot={snapshot} onKey={onKey} />);
}

export function closeClockScreen(): void {
  destroyUI(process.stdout);
}
