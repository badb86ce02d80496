// Structural form of an .aup2 project file: one record per bracketed block.

export type Aup2Field = {
  key: string;
  value: string;   // raw text after the first '='
};

export type Aup2Section =
  | { kind: 'project'; fields: Aup2Field[] }
  | { kind: 'scene'; sceneId: number; fields: Aup2Field[] }        // [scene.N]
  | { kind: 'object'; objectId: number; fields: Aup2Field[] }      // [N]
  | { kind: 'effect'; objectId: number; effectIndex: number; fields: Aup2Field[] }; // [N.K]

export type Aup2Layout = {
  bom: boolean;
  lineEnding: '\n' | '\r\n';
  finalNewline: boolean;
};

export type ParsedAup2 = {
  sections: Aup2Section[];
  layout: Aup2Layout;
  warnings: string[];
};
