/**
 * Line preprocessor — normalizes one file's text into groupable lines.
 *
 * Marks comments outside rule bodies, tracks rule nesting so comments inside
 * rules survive, and folds scattered `gtm topology ldns:` directives into one
 * synthetic `gtm topology /Common/Shared/topology` object appended at the end.
 */

import { MalformedDirectiveError } from './errors';
import { INDENT, braceBalance, isRuleHeader } from './text';

const COMMENT_MARKER = '#comment# ';
const TOPOLOGY_PREFIX = 'gtm topology ldns:';
export const TOPOLOGY_OBJECT = 'gtm topology /Common/Shared/topology';

/** Per-file topology state. Created fresh by every preprocessLines call. */
export interface TopologyContext {
  lines: string[];
  count: number;
  longestMatchEnabled: boolean;
  inRecord: boolean;
}

export function createTopologyContext(): TopologyContext {
  return { lines: [], count: 0, longestMatchEnabled: false, inRecord: false };
}

export function preprocessLines(text: string): string[] {
  const topology = createTopologyContext();
  const kept: string[] = [];
  let scriptDepth = 0;

  for (const rawLine of text.replace(/\r\n/g, '\n').split('\n')) {
    let line = rawLine;

    if (scriptDepth === 0) {
      if (line.trim().startsWith('# ')) {
        line = line.trim().replace('# ', COMMENT_MARKER);
      } else if (isRuleHeader(line)) {
        scriptDepth = 1;
      }
    } else if (!line.trim().startsWith('#')) {
      scriptDepth += braceBalance(line);
    }

    if (line.includes('topology-longest-match') && line.includes('yes')) {
      topology.longestMatchEnabled = true;
    } else if (line.startsWith(TOPOLOGY_PREFIX)) {
      addTopologyRecord(topology, line);
    } else if (topology.inRecord) {
      if (line === '}') {
        topology.inRecord = false;
        topology.lines.push(`${INDENT}${INDENT}}`);
      } else {
        topology.lines.push(`${INDENT}${INDENT}${line}`);
      }
    } else {
      kept.push(line);
    }
  }

  return [...kept, ...closeTopology(topology)].filter(
    line => line !== '' && !line.trim().startsWith(COMMENT_MARKER)
  );
}

function addTopologyRecord(topology: TopologyContext, line: string): void {
  const ldnsIndex = line.indexOf('ldns:');
  const serverIndex = line.indexOf('server:');
  const braceIndex = line.indexOf('{', serverIndex);
  if (serverIndex === -1 || braceIndex === -1) {
    throw new MalformedDirectiveError(line);
  }

  if (topology.lines.length === 0) {
    topology.lines.push(`${TOPOLOGY_OBJECT} {`, `${INDENT}records {`);
  }

  const source = line.slice(ldnsIndex + 'ldns:'.length, serverIndex).trim();
  const destination = line.slice(serverIndex + 'server:'.length, braceIndex).trim();
  const pad = INDENT.repeat(3);
  topology.lines.push(
    `${INDENT}${INDENT}topology_${topology.count} {`,
    `${pad}source ${source}`,
    `${pad}destination ${destination}`
  );
  topology.count++;

  // `... { }` on one line carries no body
  if (line.slice(braceIndex).includes('}')) {
    topology.lines.push(`${INDENT}${INDENT}}`);
    topology.inRecord = false;
  } else {
    topology.inRecord = true;
  }
}

function closeTopology(topology: TopologyContext): string[] {
  if (topology.lines.length === 0) return [];
  return [
    ...topology.lines,
    `${INDENT}${INDENT}longest-match-enabled ${String(topology.longestMatchEnabled)}`,
    `${INDENT}}`,
    '}',
  ];
}
