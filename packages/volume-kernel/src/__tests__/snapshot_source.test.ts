import assert from "node:assert/strict";
import { test } from "node:test";

import { createSnapshotSource } from "../host/snapshot_source";
import { readFixtureDocument } from "./fixtures";

test("snapshot source resolves known alignments only", () => {
  const src = createSnapshotSource(readFixtureDocument("snapshot_basic_001.json"));
  assert.deepEqual(src.resolveAlignment("AL-2"), { id: "AL-2", name: "Ramp A" });
  assert.equal(src.resolveAlignment("AL-404"), undefined);
});

test("snapshot source keeps document order of lists and items", () => {
  const src = createSnapshotSource(readFixtureDocument("snapshot_basic_001.json"));
  const lists = [...src.listMaterialLists()];
  assert.deepEqual(
    lists.map((l) => [l.id, l.alignmentId]),
    [
      ["ML-1", "AL-1"],
      ["ML-2", "AL-2"],
      ["ML-3", "AL-1"],
      ["ML-4", "AL-3"]
    ]
  );
  assert.deepEqual(
    [...lists[0].listItems()].map((i) => i.name),
    ["Topsoil", "Rock"]
  );
});

test("null quantities become an unreadable item", () => {
  const src = createSnapshotSource(readFixtureDocument("snapshot_basic_001.json"));
  const [first] = [...src.listMaterialLists()];
  const [topsoil, rock] = [...first.listItems()];
  assert.deepEqual(topsoil.readQuantities()[1], { stationStart: 20, stationEnd: 40, cutVolume: 5, fillVolume: 6 });
  assert.throws(() => rock.readQuantities(), { message: "QUANTITIES_UNREADABLE: item:MI-2" });
});
