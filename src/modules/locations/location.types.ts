export interface Location {
  id: number;
  name: string;
  flag: string | null;
  createdAt: Date;
}

export type LocationWithCounts = Location & { panelsCount: number; activePanelsCount: number };
