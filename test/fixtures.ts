import { MemoryCatalog, type CatalogDefinition } from "../src/schema/catalog.js";
import type { CollectionSchema } from "../src/schema/collection.js";

export const SVC_V1 = "https://svc.googleapis.com/v1/";
export const SVC_V2 = "https://svc.googleapis.com/v2/";
export const COMPUTE_V1 = "https://www.googleapis.com/compute/v1/";
export const STORAGE_V1 = "https://www.googleapis.com/storage/v1/";

export const widgets: CollectionSchema = {
  id: "svc.projects.widgets",
  params: ["project", "widget"],
  path: "projects/{project}/widgets/{widget}",
  baseUrl: SVC_V1,
};

export const definition: CatalogDefinition = {
  svc: {
    defaultVersion: "v1",
    versions: {
      v1: [
        { id: "svc.projects", params: ["project"], path: "projects/{project}", baseUrl: SVC_V1 },
        widgets,
        {
          id: "svc.projects.locations.gadgets",
          params: ["project", "location", "gadget"],
          path: "projects/{project}/locations/{location}/gadgets/{gadget}",
          baseUrl: SVC_V1,
        },
      ],
      v2: [
        { id: "svc.projects", params: ["project"], path: "projects/{project}", baseUrl: SVC_V2 },
        { ...widgets, baseUrl: SVC_V2 },
      ],
    },
  },
  compute: {
    versions: {
      v1: [
        {
          id: "compute.instances",
          params: ["project", "zone", "instance"],
          path: "projects/{project}/zones/{zone}/instances/{instance}",
          baseUrl: COMPUTE_V1,
        },
      ],
    },
  },
  storage: {
    versions: {
      v1: [
        { id: "storage.buckets", params: ["bucket"], path: "b/{bucket}", baseUrl: STORAGE_V1 },
        {
          id: "storage.objects",
          params: ["bucket", "object"],
          path: "b/{bucket}/o/{object}",
          baseUrl: STORAGE_V1,
        },
      ],
    },
  },
};

export function makeCatalog(): MemoryCatalog {
  return new MemoryCatalog(definition);
}
