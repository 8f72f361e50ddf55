// src/tests/sessionStore.test.ts
import { MemoryMarksSessionStore, MongoMarksSessionStore, createSessionStore } from "../services/sessionStore";
import { classTable } from "./fixtures";

const newSession = () => ({
  filename: "marks.csv",
  table: classTable(),
  passThreshold: 40,
  selection: null,
});

describe("MemoryMarksSessionStore", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("stores and returns an uploaded table", async () => {
    const store = new MemoryMarksSessionStore();
    const created = await store.create(newSession());

    const loaded = await store.get(created.id);
    expect(loaded).toMatchObject({ id: created.id, filename: "marks.csv", passThreshold: 40, selection: null });
    expect(loaded?.table).toEqual(classTable());
  });

  it("hands out copies so callers cannot mutate stored tables", async () => {
    const store = new MemoryMarksSessionStore();
    const { id } = await store.create(newSession());

    const first = await store.get(id);
    first?.table.records.pop();

    expect((await store.get(id))?.table.records).toHaveLength(3);
  });

  it("remembers and clears the selected filter", async () => {
    const store = new MemoryMarksSessionStore();
    const { id } = await store.create(newSession());

    await store.saveSelection(id, { type: "subject_fail", subject: "Math" });
    expect((await store.get(id))?.selection).toEqual({ type: "subject_fail", subject: "Math" });

    await store.saveSelection(id, null);
    expect((await store.get(id))?.selection).toBeNull();
  });

  it("forgets removed and expired sessions", async () => {
    const store = new MemoryMarksSessionStore(1);
    const start = Date.now();
    const nowSpy = jest.spyOn(Date, "now").mockReturnValue(start);

    const removed = await store.create(newSession());
    const expiring = await store.create(newSession());
    await store.remove(removed.id);
    expect(await store.get(removed.id)).toBeNull();
    expect(await store.get("unknown")).toBeNull();

    nowSpy.mockReturnValue(start + 60 * 60 * 1000);
    expect(await store.get(expiring.id)).toBeNull();
    expect(store.size).toBe(0);
  });

  it("is picked by the configured store driver", () => {
    expect(createSessionStore("memory", 1)).toBeInstanceOf(MemoryMarksSessionStore);
    expect(createSessionStore("mongo", 1)).toBeInstanceOf(MongoMarksSessionStore);
  });
});
