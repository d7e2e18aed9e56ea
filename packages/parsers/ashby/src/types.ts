export interface AshbyJobPosting {
  id: string;
  title?: string;
  locationName?: string;
}
