import { vi } from "vitest";
import type { Revision, Tag } from "../../src/model/revision.js";
import type { MetadataStorage } from "../../src/storage/metadata-storage.js";

/**
 * MetadataStorage whose methods are bare mocks; tests program the
 * calls they expect.
 */
export function createStubStorage() {
  return {
    createPackage: vi.fn<MetadataStorage["createPackage"]>(),
    appendRevision: vi.fn<MetadataStorage["appendRevision"]>(),
    getRevision: vi.fn<MetadataStorage["getRevision"]>(),
    listRevisions: vi.fn<MetadataStorage["listRevisions"]>(),
    deletePackage: vi.fn<MetadataStorage["deletePackage"]>(),
    createTag: vi.fn<MetadataStorage["createTag"]>(),
    getTag: vi.fn<MetadataStorage["getTag"]>(),
    listTags: vi.fn<MetadataStorage["listTags"]>(),
    updateTag: vi.fn<MetadataStorage["updateTag"]>(),
    deleteTag: vi.fn<MetadataStorage["deleteTag"]>(),
    close: vi.fn<() => Promise<void>>(),
  } satisfies MetadataStorage;
}

export function makeRevision(overrides: Partial<Revision> = {}): Revision {
  return {
    packageId: "pkg-a",
    revisionId: "r1",
    content: { name: "mypackage", version: "1.0.0" },
    createdAt: new Date("2024-01-01T00:00:00.000Z"),
    ...overrides,
  };
}

export function makeTag(overrides: Partial<Tag> = {}): Tag {
  return {
    packageId: "pkg-a",
    name: "ver-1.0.0",
    revisionId: "r1",
    createdAt: new Date("2024-01-02T00:00:00.000Z"),
    ...overrides,
  };
}
