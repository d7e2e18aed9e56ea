/**
 * Produces candidate posting URLs for a query. Sources are consulted in
 * order and their results merged.
 */
export interface CandidateSource {
  readonly name: string;
  collect(query: string): Promise<string[]>;
}
