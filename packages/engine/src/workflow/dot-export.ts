/**
 * DOT Export
 *
 * Renders a workflow as a Graphviz DOT document. Node shape and colour
 * scheme follow the node's role; edges out of a conditional node carry
 * their `true` / `false` label.
 *
 * @module @flowgraph/engine/workflow/dot-export
 */

import type { NodeRole } from '../node/index.js';
import type { Workflow } from './workflow.js';

interface VertexStyle {
  shape: string;
  colorscheme: string;
}

export const ROLE_STYLES: Record<NodeRole, VertexStyle> = {
  conditional: { shape: 'diamond', colorscheme: 'ylorbr3' },
  'true-branch': { shape: 'rectangle', colorscheme: 'greens3' },
  'false-branch': { shape: 'rectangle', colorscheme: 'reds3' },
  'parallel-source': { shape: 'parallelogram', colorscheme: 'purples3' },
  plain: { shape: 'rectangle', colorscheme: 'blues3' },
};

/**
 * Human-readable label for a key: dashes become spaces and each word is
 * title-cased (`send-sms` → `Send Sms`).
 */
export function displayName(key: string): string {
  return key
    .replace(/-/g, ' ')
    .split(' ')
    .map(word => (word ? word.charAt(0).toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function attributes(attrs: Record<string, string>): string {
  return Object.entries(attrs)
    .map(([name, value]) => `${name}=${quote(value)}`)
    .join(', ');
}

/**
 * Render a workflow as DOT
 *
 * @example
 * ```typescript
 * writeFileSync(`${workflow.getName()}.gv`, exportDot(workflow));
 * ```
 */
export function exportDot(workflow: Workflow): string {
  const lines: string[] = ['strict digraph {'];

  lines.push(
    `\tgraph [${attributes({
      label: displayName(workflow.getName()),
      bgcolor: 'lightgrey',
      labelloc: 't',
    })}];`
  );

  for (const node of workflow.getNodes()) {
    const style = ROLE_STYLES[node.role];
    lines.push(
      `\t${quote(displayName(node.key))} [${attributes({
        shape: style.shape,
        colorscheme: style.colorscheme,
        style: 'filled',
        color: '2',
        fillcolor: '1',
      })}];`
    );
  }

  for (const edge of workflow.getEdges()) {
    const from = quote(displayName(edge.from.key));
    const to = quote(displayName(edge.to.key));
    lines.push(
      edge.label
        ? `\t${from} -> ${to} [${attributes({ label: edge.label })}];`
        : `\t${from} -> ${to};`
    );
  }

  lines.push('}');
  return `${lines.join('\n')}\n`;
}
