import { BROWSE_PROMPT, parseBrowseAction, runBrowseLoop, step } from "./browse.js";
import { fallback, ok, type Outcome } from "./outcome.js";
import { scriptedTerminal } from "./testing.js";
import { emptyPage, type PageResult } from "./types.js";

function pagedCatalog(totalPages: number | (() => number)) {
  const calls: Array<{ category: string; page: number }> = [];
  return {
    calls,
    async list(category: string, page = 1): Promise<Outcome<PageResult>> {
      calls.push({ category, page });
      const total = typeof totalPages === "function" ? totalPages() : totalPages;
      return ok({
        total_pages: total,
        results: [{ id: page * 100, title: `Movie on page ${page}`, release_date: "2024-01-01", overview: "" }],
      });
    },
  };
}

describe("step", () => {
  test("next stops at the last page", () => {
    expect(step(1, 3, "next")).toBe(2);
    expect(step(1, 1, "next")).toBe(1);
    expect(step(3, 3, "next")).toBe(3);
  });

  test("previous stops at the first page", () => {
    expect(step(2, 3, "previous")).toBe(1);
    expect(step(1, 3, "previous")).toBe(1);
  });

  test("menu and quit end the loop; other actions stay", () => {
    expect(step(2, 3, "menu")).toBeNull();
    expect(step(2, 3, "quit")).toBeNull();
    expect(step(2, 3, "invalid")).toBe(2);
    expect(step(2, 3, "see")).toBe(2);
  });

  test("an empty listing never advances", () => {
    expect(step(1, 0, "next")).toBe(1);
  });
});

test("parseBrowseAction accepts letters and words in any case", () => {
  expect(parseBrowseAction(" N ")).toBe("next");
  expect(parseBrowseAction("previous")).toBe("previous");
  expect(parseBrowseAction("M")).toBe("menu");
  expect(parseBrowseAction("quit")).toBe("quit");
  expect(parseBrowseAction("s")).toBe("see");
  expect(parseBrowseAction("constructor")).toBe("invalid");
  expect(parseBrowseAction("")).toBe("invalid");
});

describe("runBrowseLoop", () => {
  test("next on the only page refetches the same page", async () => {
    const catalog = pagedCatalog(1);
    const terminal = scriptedTerminal(["n", "m"]);

    const last = await runBrowseLoop({ catalog, terminal, category: "popular" });

    expect(last).toBe(1);
    expect(catalog.calls.map((c) => c.page)).toEqual([1, 1]);
    expect(terminal.questions).toEqual([BROWSE_PROMPT, BROWSE_PROMPT]);
  });

  test("previous on page 1 stays on page 1", async () => {
    const catalog = pagedCatalog(5);
    const terminal = scriptedTerminal(["p", "q"]);

    await expect(runBrowseLoop({ catalog, terminal, category: "popular" })).resolves.toBe(1);
    expect(catalog.calls.map((c) => c.page)).toEqual([1, 1]);
    expect(terminal.output[terminal.output.length - 1]).toBe("Exiting browsing.");
  });

  test("walks forward and back, fetching every page fresh", async () => {
    const catalog = pagedCatalog(3);
    const terminal = scriptedTerminal(["n", "n", "n", "p", "m"]);

    const last = await runBrowseLoop({ catalog, terminal, category: "upcoming" });

    expect(last).toBe(2);
    expect(catalog.calls).toEqual([
      { category: "upcoming", page: 1 },
      { category: "upcoming", page: 2 },
      { category: "upcoming", page: 3 },
      { category: "upcoming", page: 3 },
      { category: "upcoming", page: 2 },
    ]);
    expect(terminal.output.filter((l) => l.startsWith("\nPage"))).toEqual([
      "\nPage 1 of 3",
      "\nPage 2 of 3",
      "\nPage 3 of 3",
      "\nPage 3 of 3",
      "\nPage 2 of 3",
    ]);
  });

  test("uses the total from the latest fetch", async () => {
    let total = 4;
    const catalog = pagedCatalog(() => total);
    const terminal = scriptedTerminal(["n", "n", "m"]);
    const answer = terminal.ask.bind(terminal);
    let asked = 0;
    terminal.ask = async (q) => {
      asked++;
      // catalog shrinks to two pages before the second fetch
      if (asked === 1) total = 2;
      return answer(q);
    };

    const last = await runBrowseLoop({ catalog, terminal, category: "popular" });

    expect(catalog.calls.map((c) => c.page)).toEqual([1, 2, 2]);
    expect(last).toBe(2);
  });

  test("a failed fetch renders the no-results state", async () => {
    const catalog = {
      list: async () => fallback(emptyPage(), "offline"),
    };
    const terminal = scriptedTerminal(["n"]);

    await expect(runBrowseLoop({ catalog, terminal, category: "popular" })).resolves.toBe(1);
    expect(terminal.output.slice(0, 2)).toEqual(["\nPage 1 of 0", "No results."]);
  });

  test("unknown input reprompts without moving", async () => {
    const catalog = pagedCatalog(2);
    const terminal = scriptedTerminal(["x", "m"]);

    await runBrowseLoop({ catalog, terminal, category: "popular" });

    expect(terminal.output).toContain("Invalid option. Try again.");
    expect(catalog.calls.map((c) => c.page)).toEqual([1, 1]);
  });

  test("see more hands off and keeps the page", async () => {
    const catalog = pagedCatalog(3);
    const terminal = scriptedTerminal(["n", "s", "m"]);
    const onSeeMore = jest.fn(async () => undefined);

    const last = await runBrowseLoop({ catalog, terminal, category: "popular", onSeeMore });

    expect(onSeeMore).toHaveBeenCalledTimes(1);
    expect(last).toBe(2);
  });

  test("end of input leaves the loop", async () => {
    const catalog = pagedCatalog(2);
    const terminal = scriptedTerminal([]);
    await expect(runBrowseLoop({ catalog, terminal, category: "popular", startPage: 2 })).resolves.toBe(2);
    expect(catalog.calls).toEqual([{ category: "popular", page: 2 }]);
  });
});
