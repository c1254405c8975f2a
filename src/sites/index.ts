import { SiteAdapter } from "../types/site";
import { createElutaAdapter } from "./eluta/elutaAdapter";
import { createIndeedAdapter } from "./indeed/indeedAdapter";

export function createSiteRegistry(): Map<string, SiteAdapter> {
  const registry = new Map<string, SiteAdapter>();
  const eluta = createElutaAdapter();
  registry.set(eluta.name, eluta);
  const indeed = createIndeedAdapter();
  registry.set(indeed.name, indeed);
  return registry;
}
