// src/lib/format/aup2.ts
// .aup2 writer for block records produced by the importer or the serializer.

import type { Aup2Layout, Aup2Section } from '../../types/aup2';

export const DEFAULT_LAYOUT: Aup2Layout = { bom: false, lineEnding: '\r\n', finalNewline: true };

function header(section: Aup2Section): string {
  switch (section.kind) {
    case 'project': return '[project]';
    case 'scene': return `[scene.${section.sceneId}]`;
    case 'object': return `[${section.objectId}]`;
    case 'effect': return `[${section.objectId}.${section.effectIndex}]`;
  }
}

export function writeAup2(sections: Aup2Section[], layout: Aup2Layout = DEFAULT_LAYOUT): string {
  const out: string[] = [];
  for (const s of sections) {
    out.push(header(s));
    for (const f of s.fields) out.push(`${f.key}=${f.value}`);
  }

  let text = out.join(layout.lineEnding);
  if (layout.finalNewline && out.length) text += layout.lineEnding;
  return layout.bom ? `\uFEFF${text}` : text;
}
