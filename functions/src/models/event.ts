export interface EventRecord {
  id: string;
  title: string;
  organizer?: string | null;
  subtype?: string | null;
  teaser?: string | null;
  description?: string | null;
}

export interface GroundTruthRecord {
  eventId: string;
  // Priority order: tags[0] is the primary category.
  tags: string[];
}

export interface DatasetEntry {
  event: EventRecord;
  groundTruth: GroundTruthRecord;
}
