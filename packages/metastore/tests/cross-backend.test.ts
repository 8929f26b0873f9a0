/**
 * Replays one scripted session against every backend and compares what a
 * caller observes with the in-memory reference backend.
 *
 * Messages, descriptions and timestamps are backend-specific and left
 * out of the comparison; revision ids are compared by history position.
 */

import { BackendRegistry, ConflictError, type MetadataDocument, type Metastore } from "@metastore/core";
import { FilesMetadataStorage } from "@metastore/store-files";
import { MemoryRepositoryHost, RepositoryMetadataStorage } from "@metastore/store-github";
import { MemoryMetadataStorage } from "@metastore/store-mem";
import { expectFailure } from "@metastore/testing";
import { MemFilesApi } from "@statewalker/webrun-files-mem";
import { describe, expect, it } from "vitest";
import { createMetastore } from "../src/index.js";

const registry = new BackendRegistry()
  .register("reference", () => new MemoryMetadataStorage())
  .register("files", () => new FilesMetadataStorage({ files: new MemFilesApi() }))
  .register(
    "repository",
    () => new RepositoryMetadataStorage({ host: new MemoryRepositoryHost(), defaultOwner: "acme" }),
  );

async function runSession(metastore: Metastore) {
  const r1 = await metastore.create("pkg-a", { name: "mypackage", version: "1.0.0" });
  const r2 = await metastore.update("pkg-a", { name: "mypackage", version: "1.0.1" }, { baseRevisionId: r1.revisionId });
  const conflict = await expectFailure(
    metastore.update("pkg-a", { name: "mypackage", version: "1.0.2" }, { baseRevisionId: r1.revisionId }),
    "conflict",
  );
  await metastore.update("pkg-a", { description: "Sample data" }, { baseRevisionId: r2.revisionId, partial: true });
  await metastore.tagCreate("pkg-a", r2.revisionId, "ver-1.0.1");
  const duplicate = await expectFailure(metastore.tagCreate("pkg-a", r1.revisionId, "ver-1.0.1"), "already-exists");
  await metastore.update("pkg-a", { name: "mypackage", version: "2.0.0" });

  const history = await metastore.revisionList("pkg-a");
  const ids = history.map((revision) => revision.revisionId);
  const position = (revisionId: string | undefined) => (revisionId === undefined ? -1 : ids.indexOf(revisionId));
  const contents: MetadataDocument[] = [];
  for (const revision of history) {
    contents.push((await metastore.fetch("pkg-a", revision.revisionId)).content);
  }
  const tag = await metastore.tagFetch("pkg-a", "ver-1.0.1");
  const tagged = await metastore.fetchTagged("pkg-a", "ver-1.0.1");

  await metastore.delete("pkg-a");
  const deleted = await expectFailure(metastore.fetch("pkg-a"), "not-found");

  return {
    contents,
    parents: history.map((revision) => position(revision.parentRevisionId)),
    conflictHead: conflict instanceof ConflictError ? position(conflict.currentRevisionId) : undefined,
    duplicate: duplicate.kind,
    tag: { name: tag.name, position: position(tag.revisionId) },
    tagged: tagged.content,
    afterDelete: deleted.kind,
  };
}

describe("cross-backend session", () => {
  it("behaves as documented on the reference backend", async () => {
    const observed = await runSession(await createMetastore("reference", {}, { registry }));

    expect(observed.contents).toEqual([
      { name: "mypackage", version: "2.0.0" },
      { name: "mypackage", version: "1.0.1", description: "Sample data" },
      { name: "mypackage", version: "1.0.1" },
      { name: "mypackage", version: "1.0.0" },
    ]);
    expect(observed.parents).toEqual([1, 2, 3, -1]);
    expect(observed.conflictHead).toBe(2);
    expect(observed.tag).toEqual({ name: "ver-1.0.1", position: 2 });
    expect(observed.tagged).toEqual({ name: "mypackage", version: "1.0.1" });
    expect(observed.afterDelete).toBe("not-found");
  });

  it.each(["files", "repository"])("matches the reference backend on %s", async (type) => {
    const reference = await runSession(await createMetastore("reference", {}, { registry }));
    const observed = await runSession(await createMetastore(type, {}, { registry }));

    expect(observed).toEqual(reference);
  });
});
