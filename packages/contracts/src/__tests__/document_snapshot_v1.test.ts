import assert from "node:assert/strict";
import { test } from "node:test";

import { CrossSectionDocumentV1Z, parseCrossSectionDocumentV1 } from "../schema/document_snapshot_v1";

function doc(): Record<string, unknown> {
  return {
    type: "cross_section_document_v1",
    schema_version: "1.0.0",
    alignments: [{ id: "AL-1", name: "Mainline" }],
    material_lists: [
      {
        id: "ML-1",
        name: "Mainline Earthwork",
        alignmentId: "AL-1",
        items: [
          { id: "MI-1", name: "Topsoil", quantities: [{ stationStart: 40, stationEnd: 20, cutVolume: 1, fillVolume: 0 }] },
          { id: "MI-2", name: "Rock", quantities: null }
        ]
      }
    ]
  };
}

test("accepts a valid snapshot, including an inverted station range", () => {
  const parsed = parseCrossSectionDocumentV1(doc());
  assert.equal(parsed.material_lists[0].items[0].quantities?.[0].stationStart, 40);
  assert.equal(parsed.material_lists[0].items[1].quantities, null);
});

test("rejects negative volumes", () => {
  const bad = doc();
  bad.material_lists = [
    {
      id: "ML-1",
      name: "L",
      alignmentId: "AL-1",
      items: [{ id: "MI-1", name: "T", quantities: [{ stationStart: 0, stationEnd: 1, cutVolume: -1, fillVolume: 0 }] }]
    }
  ];
  const res = CrossSectionDocumentV1Z.safeParse(bad);
  assert.equal(res.success, false);
  if (res.success) return;
  assert.deepEqual(res.error.issues[0].path, ["material_lists", 0, "items", 0, "quantities", 0, "cutVolume"]);
});

test("rejects unknown keys", () => {
  const res = CrossSectionDocumentV1Z.safeParse({ ...doc(), transaction: "open" });
  assert.equal(res.success, false);
  if (res.success) return;
  assert.equal(res.error.issues[0].code, "unrecognized_keys");
});

test("rejects duplicate alignment ids", () => {
  const res = CrossSectionDocumentV1Z.safeParse({
    ...doc(),
    alignments: [
      { id: "AL-1", name: "Mainline" },
      { id: "AL-1", name: "Copy" }
    ]
  });
  assert.equal(res.success, false);
  if (res.success) return;
  assert.equal(res.error.issues[0].message, "duplicate alignment id: AL-1");
  assert.deepEqual(res.error.issues[0].path, ["alignments", 1, "id"]);
});
