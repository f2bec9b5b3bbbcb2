import { ConflictError } from "../errors";
import type { LiveResource, LiveResourcePage, ResourceRegistry } from "./types";

type RegistryEntry = {
  resource: LiveResource;
  status: "ACTIVE" | "RETIRED";
};

function copyResource(resource: LiveResource): LiveResource {
  return { ...resource, classifications: [...resource.classifications] };
}

export class InMemoryResourceRegistry implements ResourceRegistry {
  private readonly entries = new Map<string, RegistryEntry>();

  private active(): LiveResource[] {
    return Array.from(this.entries.values())
      .filter((entry) => entry.status === "ACTIVE")
      .map((entry) => entry.resource);
  }

  async getLiveResource(id: string): Promise<LiveResource | null> {
    const entry = this.entries.get(id);
    return entry?.status === "ACTIVE" ? copyResource(entry.resource) : null;
  }

  // Retired ids stay taken, as they do in clone_registry.
  async registerResource(resource: LiveResource): Promise<LiveResource> {
    if (this.entries.has(resource.id)) {
      throw new ConflictError(`Clone ${resource.id} is already registered`);
    }
    this.entries.set(resource.id, { resource: copyResource(resource), status: "ACTIVE" });
    return copyResource(resource);
  }

  async retireResource(id: string): Promise<LiveResource | null> {
    const entry = this.entries.get(id);
    if (!entry || entry.status !== "ACTIVE") {
      return null;
    }
    entry.status = "RETIRED";
    return copyResource(entry.resource);
  }

  async countLiveResources(owner: string): Promise<number> {
    return this.active().filter((resource) => resource.owner === owner).length;
  }

  async listLiveResources(page: LiveResourcePage): Promise<LiveResource[]> {
    return this.active()
      .filter((resource) => {
        if (page.scope && resource.scope !== page.scope) {
          return false;
        }
        if (page.after !== undefined && resource.id <= page.after) {
          return false;
        }
        return true;
      })
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, page.limit)
      .map(copyResource);
  }
}
