import fs from "node:fs";
import path from "node:path";
import { loadAdminRegistry } from "../adminRegistry";
import { makeTempDir, removeDir } from "../../__tests__/helpers/fixtures";

describe("admin registry", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = makeTempDir();
    filePath = path.join(dir, "admins.json");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("merges configured ids with ids persisted at runtime", async () => {
    fs.writeFileSync(filePath, JSON.stringify({ adminIds: [5, 1] }));
    const admins = await loadAdminRegistry({ seedIds: [1], filePath });

    expect(admins.list()).toEqual([1, 5]);
    expect(admins.isAdmin(5)).toBe(true);
    expect(admins.isAdmin(2)).toBe(false);
  });

  it("starts from the configured ids when no admin file exists", async () => {
    const admins = await loadAdminRegistry({ seedIds: [3, 1], filePath });
    expect(admins.list()).toEqual([1, 3]);
    expect(fs.existsSync(filePath)).toBe(false);
  });

  it("persists added admins for the next load", async () => {
    const admins = await loadAdminRegistry({ seedIds: [1], filePath });

    expect(await admins.add(2)).toBe(true);
    expect(await admins.add(2)).toBe(false);

    const reloaded = await loadAdminRegistry({ seedIds: [], filePath });
    expect(reloaded.list()).toEqual([1, 2]);
  });

  it("removes admins but never the last one", async () => {
    const admins = await loadAdminRegistry({ seedIds: [1, 2], filePath });

    expect(await admins.remove(3)).toBe("not_admin");
    expect(await admins.remove(2)).toBe("removed");
    expect(await admins.remove(1)).toBe("last_admin");
    expect(admins.list()).toEqual([1]);
  });

  it("ignores an admin file it cannot read", async () => {
    fs.writeFileSync(filePath, "{oops");
    const unreadable = await loadAdminRegistry({ seedIds: [1], filePath });
    expect(unreadable.list()).toEqual([1]);

    fs.writeFileSync(filePath, JSON.stringify({ adminIds: ["x"] }));
    const malformed = await loadAdminRegistry({ seedIds: [1], filePath });
    expect(malformed.list()).toEqual([1]);
  });
});
