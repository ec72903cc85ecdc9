import { render, type Instance } from 'ink';
import type { ReactNode } from 'react';

const instances = new WeakMap<NodeJS.WriteStream, Instance>();

/** Mounts `node` on the stream the first time, re-renders it afterwards. */
export function renderUI(stdout: NodeJS.WriteStream, node: ReactNode): void {
  const instance = instances.get(stdout);
  if (instance) {
    instance.rerender(node);
    return;
  }

  instances.set(
    stdout,
    render(node, {
      stdout,
      // ctrl+c is a key like any other; the reducer turns it into quit
      exitOnCtrlC: false,
      patchConsole: false,
    })
  );
}

export function destroyUI(stdout: NodeJS.WriteStream): void {
  const instance = instances.get(stdout);
  if (instance) {
    instance.unmount();
    instance.cleanup();
    instances.delete(stdout);
  }
}
