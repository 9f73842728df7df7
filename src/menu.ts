import { addToWatchlist, browse, DEFAULT_CATEGORY, exportWatchlist, listWatchlist, showDetails } from "./commands.js";
import type { AppContext } from "./context.js";
import { errorMessage } from "./logger.js";

export const MENU_TEXT = [
  "\n--- Movie CLI Menu ---",
  "1. Browse Movies",
  "2. Movie Details",
  "3. Add to Watchlist",
  "4. View Watchlist",
  "5. Export Watchlist",
  "6. Exit",
].join("\n");

type MenuEntry = (ctx: AppContext) => Promise<unknown>;

const ENTRIES = new Map<string, MenuEntry>([
  [
    "1",
    async (ctx) => {
      const category = await ctx.terminal.ask(`Enter category (e.g., popular, top_rated, upcoming) [${DEFAULT_CATEGORY}]: `);
      if (category !== null) await browse(ctx, category);
    },
  ],
  [
    "2",
    async (ctx) => {
      const id = await ctx.terminal.ask("Enter movie ID: ");
      if (id !== null) await showDetails(ctx, id);
    },
  ],
  [
    "3",
    async (ctx) => {
      const id = await ctx.terminal.ask("Enter movie ID to add to watchlist: ");
      if (id !== null) await addToWatchlist(ctx, id);
    },
  ],
  ["4", async (ctx) => listWatchlist(ctx)],
  [
    "5",
    async (ctx) => {
      const target = await ctx.terminal.ask("Enter export path (or press Enter for default): ");
      if (target !== null) await exportWatchlist(ctx, target);
    },
  ],
]);

/** Numbered menu loop; returns when the user picks Exit or input ends. */
export async function runMenu(ctx: AppContext): Promise<void> {
  for (;;) {
    ctx.terminal.print(MENU_TEXT);
    const answer = await ctx.terminal.ask("Enter your choice (1-6): ");
    const choice = answer === null ? "6" : answer.trim();

    if (choice === "6") {
      ctx.terminal.print("Thank you for using Movie CLI!");
      return;
    }

    const entry = ENTRIES.get(choice);
    if (!entry) {
      ctx.terminal.print("Invalid choice. Please try again.");
      continue;
    }

    try {
      await entry(ctx);
    } catch (e) {
      ctx.logger.error(`Menu action ${choice} failed: ${errorMessage(e)}`);
      ctx.terminal.print("Something went wrong. Please try again.");
    }
  }
}
