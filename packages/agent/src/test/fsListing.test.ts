import assert from "node:assert/strict";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { test } from "node:test";
import { attachListings, listDirectory, resolveInsideMounts } from "../fsListing";
import { DriveRecord } from "../types";

function withTempDir(run: (root: string) => Promise<void>): () => Promise<void> {
  return async () => {
    const root = mkdtempSync(join(tmpdir(), "hostlink-fs-"));
    try {
      await run(root);
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  };
}

function mounted(deviceNode: string, mountPoint: string): DriveRecord {
  return {
    deviceNode,
    name: deviceNode,
    sizeGb: 1,
    mountPoints: [{ device: deviceNode, mountPoint, mountName: "STICK", filesystem: "vfat" }],
    files: [],
  };
}

test(
  "listings put directories first and order names case-insensitively",
  withTempDir(async (root) => {
    mkdirSync(join(root, "photos"));
    writeFileSync(join(root, "photos", "a.jpg"), "x");
    writeFileSync(join(root, "photos", "b.jpg"), "x");
    writeFileSync(join(root, "Zeta.TXT"), "hello");
    writeFileSync(join(root, "alpha.md"), "hi");

    const entries = await listDirectory(root);

    assert.deepEqual(
      entries.map(({ name, type, size, extension }) => ({ name, type, size, extension })),
      [
        { name: "photos", type: "directory", size: 2, extension: undefined },
        { name: "alpha.md", type: "file", size: 2, extension: ".md" },
        { name: "Zeta.TXT", type: "file", size: 5, extension: ".txt" },
      ],
    );
    assert.equal(entries[0].path, join(root, "photos"));
  }),
);

test(
  "listings are capped and only the first drives get their files attached",
  withTempDir(async (root) => {
    for (let index = 0; index < 5; index += 1) {
      writeFileSync(join(root, `file-${index}.bin`), "");
    }

    assert.equal((await listDirectory(root, 3)).length, 3);

    const drives = await attachListings([mounted("/dev/sda1", root), mounted("/dev/sdb1", root)], 1);
    assert.equal(drives[0].files.length, 5);
    assert.deepEqual(drives[1].files, []);

    const missing = await attachListings([mounted("/dev/sdc1", join(root, "gone"))]);
    assert.deepEqual(missing[0].files, []);
  }),
);

test("paths resolve only when they stay inside a mount point", () => {
  const drives = [mounted("/dev/sdb1", "/media/user/STICK")];

  assert.equal(resolveInsideMounts("/media/user/STICK", drives), "/media/user/STICK");
  assert.equal(resolveInsideMounts("media/user/STICK/docs", drives), "/media/user/STICK/docs");
  assert.equal(resolveInsideMounts("/media/user/STICK/../../../etc", drives), null);
  assert.equal(resolveInsideMounts("/media/user/STICKY", drives), null);
  assert.equal(resolveInsideMounts("/etc/passwd", []), null);
});
