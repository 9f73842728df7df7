import fs from "fs";
import os from "os";
import path from "path";

import { recordingLogger } from "../testing.js";
import type { MovieRecord } from "../types.js";
import { WatchlistStore } from "./watchlistStore.js";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "movie-cli-store-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function makeStore(fileName = "watchlist.json") {
  const logger = recordingLogger();
  const store = new WatchlistStore({
    filePath: path.join(dir, fileName),
    exportPath: path.join(dir, "export.json"),
    logger,
  });
  return { store, logger };
}

const sample: MovieRecord = { id: 42, title: "Sample", release_date: "2001-01-01", overview: "" };

test("a missing file loads as an empty watchlist", async () => {
  const { store, logger } = makeStore();
  await expect(store.load()).resolves.toEqual([]);
  expect(logger.entries.filter((e) => e.level !== "debug")).toEqual([]);
});

test("adding the same id twice keeps the first record", async () => {
  const { store } = makeStore();
  await store.load();

  await expect(store.add(sample)).resolves.toBe(true);
  expect(store.list()).toEqual([sample]);

  await expect(store.add({ ...sample, title: "Sample-Duplicate" })).resolves.toBe(false);
  expect(store.list()).toHaveLength(1);
  expect(store.list()[0].title).toBe("Sample");
});

test("add persists immediately", async () => {
  const { store } = makeStore();
  await store.load();
  await store.add(sample);

  const onDisk = JSON.parse(fs.readFileSync(store.filePath, "utf8"));
  expect(onDisk).toEqual([sample]);
});

test("save then load reproduces every field", async () => {
  const movies: MovieRecord[] = [
    sample,
    {
      id: 7,
      title: "Full Record",
      release_date: "Unknown",
      vote_average: 7.5,
      overview: "Two people, one plan.",
      ai_summary: "A tight heist story.",
    },
  ];
  const { store } = makeStore();
  await expect(store.save(movies)).resolves.toBe(true);

  const reopened = makeStore().store;
  await expect(reopened.load()).resolves.toEqual(movies);
});

test("an empty list round-trips", async () => {
  const { store } = makeStore();
  await store.save([]);
  expect(fs.readFileSync(store.filePath, "utf8")).toBe("[]\n");
  await expect(makeStore().store.load()).resolves.toEqual([]);
});

test("malformed JSON loads as empty and warns", async () => {
  fs.writeFileSync(path.join(dir, "watchlist.json"), "{not json", "utf8");
  const { store, logger } = makeStore();
  await expect(store.load()).resolves.toEqual([]);
  expect(logger.entries.map((e) => e.level)).toEqual(["warn"]);
});

test("a non-array document loads as empty and warns", async () => {
  fs.writeFileSync(path.join(dir, "watchlist.json"), '{"id": 1}', "utf8");
  const { store, logger } = makeStore();
  await expect(store.load()).resolves.toEqual([]);
  expect(logger.entries).toEqual([{ level: "warn", message: "Watchlist file does not hold a JSON array" }]);
});

test("unusable and duplicate entries are skipped on load", async () => {
  const raw = [
    { id: 1, title: "Keep" },
    { id: 1, title: "Duplicate" },
    { id: "x", title: "Bad id" },
    { id: 2 },
  ];
  fs.writeFileSync(path.join(dir, "watchlist.json"), JSON.stringify(raw), "utf8");
  const { store, logger } = makeStore();

  await expect(store.load()).resolves.toEqual([{ id: 1, title: "Keep", release_date: "Unknown", overview: "" }]);
  expect(logger.entries).toEqual([{ level: "warn", message: "Skipped 3 unusable watchlist entries" }]);
});

test("a failed save is logged and the in-memory list stays", async () => {
  // the store path is a directory, so the rename cannot replace it
  fs.mkdirSync(path.join(dir, "blocked"));
  fs.writeFileSync(path.join(dir, "blocked", "keep"), "", "utf8");
  const { store, logger } = makeStore("blocked");
  await store.load();

  await expect(store.add(sample)).resolves.toBe(true);
  expect(store.list()).toEqual([sample]);
  expect(logger.entries.filter((e) => e.level === "error")).toHaveLength(1);
  expect(fs.readdirSync(dir).sort()).toEqual(["blocked"]);
});

test("export writes to the given path or the default", async () => {
  const { store } = makeStore();
  await store.load();
  await store.add(sample);

  const custom = path.join(dir, "nested", "out.json");
  await expect(store.export(custom)).resolves.toBe(custom);
  expect(JSON.parse(fs.readFileSync(custom, "utf8"))).toEqual([sample]);

  await expect(store.export("   ")).resolves.toBe(path.join(dir, "export.json"));
  expect(JSON.parse(fs.readFileSync(path.join(dir, "export.json"), "utf8"))).toEqual([sample]);
});

test("export failure resolves undefined", async () => {
  const { store, logger } = makeStore();
  await store.load();
  fs.writeFileSync(path.join(dir, "file"), "", "utf8");

  await expect(store.export(path.join(dir, "file", "out.json"))).resolves.toBeUndefined();
  expect(logger.entries.filter((e) => e.level === "error")).toHaveLength(1);
});

test("records are stored the way load reads them back", async () => {
  const padded: MovieRecord = { id: 1, title: " Padded ", release_date: "", overview: "", ai_summary: "" };
  const stored: MovieRecord = { id: 1, title: "Padded", release_date: "Unknown", overview: "" };

  const { store } = makeStore();
  await store.load();
  await expect(store.add(padded)).resolves.toBe(true);
  expect(store.list()).toEqual([stored]);

  await expect(makeStore().store.load()).resolves.toEqual(store.list());
});

test("save drops records that load would drop", async () => {
  const { store, logger } = makeStore();
  const zero: MovieRecord = { id: 0, title: "Zero", release_date: "", overview: "" };
  await expect(store.save([sample, { ...sample, title: "Again" }, zero])).resolves.toBe(true);

  expect(store.list()).toEqual([sample]);
  expect(JSON.parse(fs.readFileSync(store.filePath, "utf8"))).toEqual([sample]);
  expect(logger.entries).toEqual([{ level: "warn", message: "Skipped 2 unusable watchlist records" }]);
});

test("add after save keeps the saved records", async () => {
  const other: MovieRecord = { id: 7, title: "Other", release_date: "1999-03-31", overview: "" };
  const { store } = makeStore();
  await store.save([sample]);
  await store.add(other);

  await expect(makeStore().store.load()).resolves.toEqual([sample, other]);
});

test("add refuses a record without a title", async () => {
  const { store, logger } = makeStore();
  await store.load();

  await expect(store.add({ ...sample, title: "  " })).resolves.toBe(false);
  expect(store.list()).toEqual([]);
  expect(logger.entries.filter((e) => e.level === "warn")).toEqual([
    { level: "warn", message: "Refused an unusable watchlist record" },
  ]);
});
