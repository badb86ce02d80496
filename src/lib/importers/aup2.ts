import type { Aup2Field, Aup2Layout, Aup2Section, ParsedAup2 } from '../../types/aup2';
import { Aup2ParseError } from '../errors';

// Any bracketed line is a block header
const HEADER_RE = /^\[(.*)\]$/;
// [project]
const PROJECT_RE = /^project$/;
// [scene.N]
const SCENE_RE = /^scene\.(\d+)$/;
// [N]
const OBJECT_RE = /^(\d+)$/;
// [N.K] effect K of object N
const EFFECT_RE = /^(\d+)\.(\d+)$/;

function headerKey(section: Aup2Section): string {
  switch (section.kind) {
    case 'project': return 'project';
    case 'scene': return `scene.${section.sceneId}`;
    case 'object': return `${section.objectId}`;
    case 'effect': return `${section.objectId}.${section.effectIndex}`;
  }
}

function toSection(name: string, lineNo: number): Aup2Section {
  if (PROJECT_RE.test(name)) return { kind: 'project', fields: [] };

  let m = SCENE_RE.exec(name);
  if (m) return { kind: 'scene', sceneId: parseInt(m[1], 10), fields: [] };

  m = OBJECT_RE.exec(name);
  if (m) return { kind: 'object', objectId: parseInt(m[1], 10), fields: [] };

  m = EFFECT_RE.exec(name);
  if (m) {
    return {
      kind: 'effect',
      objectId: parseInt(m[1], 10),
      effectIndex: parseInt(m[2], 10),
      fields: [],
    };
  }

  throw new Aup2ParseError(`Unrecognized block header [${name}]`, lineNo);
}

/**
 * Split .aup2 text into block records.
 * Values are kept as raw strings so unknown fields survive a round trip untouched.
 */
export function parseAup2(text: string): ParsedAup2 {
  const bom = text.startsWith('\uFEFF');
  const body = bom ? text.slice(1) : text;
  const layout: Aup2Layout = {
    bom,
    lineEnding: body.includes('\r\n') ? '\r\n' : '\n',
    finalNewline: /\r?\n$/.test(body),
  };

  const sections: Aup2Section[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();
  let cur: Aup2Section | null = null;

  const rawLines = body.split(/\r?\n/);
  for (let i = 0; i < rawLines.length; i++) {
    const lineNo = i + 1;
    const line = rawLines[i].trim();
    if (!line) continue;

    const header = HEADER_RE.exec(line);
    if (header) {
      const section = toSection(header[1], lineNo);
      const key = headerKey(section);
      if (seen.has(key)) {
        throw new Aup2ParseError(`Duplicate block [${key}]`, lineNo);
      }
      seen.add(key);
      sections.push(section);
      cur = section;
      continue;
    }

    const eq = line.indexOf('=');
    if (eq === -1) {
      warnings.push(`Line ${lineNo}: no '=' in "${line}", dropped.`);
      continue;
    }
    if (!cur) {
      warnings.push(`Line ${lineNo}: "${line}" appears before any block, dropped.`);
      continue;
    }

    const field: Aup2Field = { key: line.slice(0, eq).trim(), value: line.slice(eq + 1) };
    cur.fields.push(field);
  }

  return { sections, layout, warnings };
}
