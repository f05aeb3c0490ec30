/**
 * Naming conventions shared by the parser and the Cypher generator.
 */

/**
 * Name that ENRICH output expressions use for a row of the factor table:
 * `emission_factor_table` rows are referenced as `emission_factor.<field>`.
 */
export function factorRowAlias(factorTable: string): string {
  return factorTable.endsWith("_table") && factorTable.length > "_table".length
    ? factorTable.slice(0, -"_table".length)
    : factorTable;
}

/** Relationship type linking an enriched node back to its source node. */
export function provenanceRelationship(source: string): string {
  return `FROM_${source.toUpperCase().replace(/[^A-Z0-9_]/g, "_")}`;
}
