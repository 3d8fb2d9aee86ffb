export interface Correlation<R> {
  /** Registros encontrados, por id de integração */
  resolved: Map<string, R>;
  /** Ids enviados que não apareceram na consulta */
  unresolved: string[];
}

/**
 * Cruza os ids enviados com os registros de uma consulta posterior.
 *
 * Id ausente da consulta fica em `unresolved`: ainda pode estar em
 * processamento no servidor e não deve ser tratado como falha.
 */
export function correlate<R>(
  submittedIds: readonly (string | number)[],
  records: readonly R[],
  keyOf: (record: R) => string | number
): Correlation<R> {
  const lookup = new Map<string, R>();
  for (const record of records) {
    lookup.set(String(keyOf(record)), record);
  }

  const resolved = new Map<string, R>();
  const unresolved: string[] = [];

  for (const rawId of submittedIds) {
    const id = String(rawId);
    const record = lookup.get(id);
    if (record === undefined) {
      if (!unresolved.includes(id)) {
        unresolved.push(id);
      }
      continue;
    }
    resolved.set(id, record);
  }

  return { resolved, unresolved };
}

/**
 * Monta os parâmetros de consulta de uma página com exatamente `ids.length`
 * registros, um `idintegracao` por id.
 */
export function idFilterParams(ids: readonly string[]): { name: string; value: string | number }[] {
  return [
    { name: 'limit', value: ids.length },
    ...ids.map((id) => ({ name: 'idintegracao', value: id })),
  ];
}
