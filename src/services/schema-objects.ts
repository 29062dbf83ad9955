export type SchemaObjectKind = 'table' | 'view' | 'procedure' | 'function' | 'trigger';

export type SchemaObject = {
  kind: SchemaObjectKind;
  name: string;
};

export type SchemaComparison = {
  missing: SchemaObject[];
  unexpected: SchemaObject[];
};

const KINDS: Record<string, SchemaObjectKind> = {
  table: 'table',
  view: 'view',
  procedure: 'procedure',
  function: 'function',
  trigger: 'trigger',
};

const IDENTIFIER = '(?:`[^`]+`|"[^"]+"|[\\w$]+)';

const CREATE_PATTERN = new RegExp(
  [
    '\\bCREATE\\s+',
    '(?:OR\\s+REPLACE\\s+)?',
    '(?:ALGORITHM\\s*=\\s*\\w+\\s+)?',
    '(?:DEFINER\\s*=\\s*\\S+\\s+)?',
    '(?:SQL\\s+SECURITY\\s+\\w+\\s+)?',
    '(?:TEMPORARY\\s+)?',
    '(TABLE|VIEW|PROCEDURE|FUNCTION|TRIGGER)\\s+',
    '(?:IF\\s+NOT\\s+EXISTS\\s+)?',
    `(${IDENTIFIER}(?:\\.${IDENTIFIER})?)`,
  ].join(''),
  'gi'
);

// mysqldump wraps version-gated syntax as /*!50003 ... */; keep the body, drop plain comments
function stripComments(sql: string): string {
  return sql
    .replace(/\/\*!\d*\s?([\s\S]*?)\*\//g, ' $1 ')
    .replace(/\/\*[\s\S]*?\*\//g, ' ')
    .replace(/^\s*--.*$/gm, '');
}

function unquote(identifier: string): string {
  const last = identifier.match(new RegExp(IDENTIFIER, 'g'))?.pop() ?? identifier;
  return last.replace(/^[`"]|[`"]$/g, '').toLowerCase();
}

function compareObjects(a: SchemaObject, b: SchemaObject): number {
  if (a.kind !== b.kind) {
    return a.kind < b.kind ? -1 : 1;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/** Objects declared by CREATE statements, sorted by kind then name, without duplicates. */
export function listSchemaObjects(sql: string): SchemaObject[] {
  const seen = new Map<string, SchemaObject>();
  for (const match of stripComments(sql).matchAll(CREATE_PATTERN)) {
    const kind: SchemaObjectKind | undefined = KINDS[match[1].toLowerCase()];
    if (!kind) {
      continue;
    }
    const name = unquote(match[2]);
    seen.set(`${kind}:${name}`, { kind, name });
  }
  return [...seen.values()].sort(compareObjects);
}

export function compareSchemaObjects(expected: SchemaObject[], actual: SchemaObject[]): SchemaComparison {
  const key = (object: SchemaObject) => `${object.kind}:${object.name}`;
  const actualKeys = new Set(actual.map(key));
  const expectedKeys = new Set(expected.map(key));
  return {
    missing: expected.filter((object) => !actualKeys.has(key(object))),
    unexpected: actual.filter((object) => !expectedKeys.has(key(object))),
  };
}
