export type LiveResource = {
  id: string;
  name: string;
  kind: string;
  scope: string | null;
  owner: string;
  sourceDatabase: string | null;
  sourceSchema: string | null;
  classifications: string[];
  createdAt: Date;
};

export type LiveResourcePage = {
  scope?: string | null;
  /** Keyset cursor: only resources with an id greater than this are returned. */
  after?: string;
  limit: number;
};

/** The clones the creation workflow currently keeps alive. */
export interface ResourceRegistry {
  countLiveResources(owner: string): Promise<number>;
  listLiveResources(page: LiveResourcePage): Promise<LiveResource[]>;
  getLiveResource(id: string): Promise<LiveResource | null>;
  registerResource(resource: LiveResource): Promise<LiveResource>;
  /** Marks a live clone as dropped; null when it is unknown or already retired. */
  retireResource(id: string): Promise<LiveResource | null>;
}
