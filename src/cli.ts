import { Command } from "commander";
import { createPool, initDb, PgAlertStore, PgCreditUsage } from "./db.js";
import { createAlerts, moveTarget, progressBar, rankByProximity, type DirectionChoice } from "./services/alert-admin.js";
import { currencySymbol } from "./services/exchanges.js";
import { isMarketOpen, secondsUntilOpen } from "./services/market-hours.js";
import { buildMonitorContext } from "./scheduler.js";
import { normalizeTicker, searchTicker } from "./services/ticker-search.js";

const pool = createPool();
await initDb(pool);
const store = new PgAlertStore(pool);
const ctx = buildMonitorContext(store, new PgCreditUsage(pool));
const searchChain = [ctx.domestic, ctx.metered, ctx.freeBatch];

const program = new Command();

program
  .name("price-alerts")
  .description("Manage one-shot price alerts watched by the monitor")
  .requiredOption("-o, --owner <id>", "Owner to operate as");

function ownerOption(): string {
  return program.opts<{ owner: string }>().owner;
}

function parsePositive(raw: string, label: string): number {
  const value = parseFloat(raw.replace(",", "."));
  if (!Number.isFinite(value) || value <= 0) {
    console.error(`Error: ${label} must be a positive number`);
    process.exit(1);
  }
  return value;
}

function parseDirection(raw: string | undefined): DirectionChoice | undefined {
  if (raw == null) return undefined;
  if (raw === "above" || raw === "below" || raw === "both") return raw;
  console.error(`Error: --direction must be "above", "below" or "both"`);
  process.exit(1);
}

function formatWait(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  return h > 0 ? `${h}h ${m}m` : `${m}m`;
}

program
  .command("search <ticker>")
  .description("Look up a ticker across the price providers")
  .action(async (raw: string) => {
    if (!normalizeTicker(raw)) {
      console.error(`Error: "${raw}" is not a valid ticker`);
      process.exit(1);
    }
    const quote = await searchTicker(raw, searchChain);
    if (!quote) {
      console.error(`Ticker ${raw.toUpperCase()} not found.`);
      process.exit(1);
    }
    const session = isMarketOpen(quote.exchange)
      ? "open"
      : `closed, opens in ${formatWait(secondsUntilOpen(quote.exchange))}`;
    console.log(`${quote.ticker} (${quote.companyName}) on ${quote.exchange}, market ${session}`);
    console.log(`  Current price: ${quote.price.toFixed(2)} ${currencySymbol(quote.currency)}`);
  });

program
  .command("add <ticker>")
  .description("Add a one-shot price alert, or an above/below pair with --direction both")
  .requiredOption("--target <price>", "Target price (the upper leg with --direction both)")
  .option("--direction <direction>", "above | below | both (default: inferred from the current price)")
  .option("--lower <price>", "Lower target, required with --direction both")
  .action(async (raw: string, opts: { target: string; direction?: string; lower?: string }) => {
    const ownerId = ownerOption();
    const target = parsePositive(opts.target, "--target");
    const direction = parseDirection(opts.direction);
    const lowerTarget = opts.lower != null ? parsePositive(opts.lower, "--lower") : undefined;
    if (direction === "both" && (lowerTarget == null || lowerTarget >= target)) {
      console.error("Error: --direction both needs --lower below --target");
      process.exit(1);
    }

    console.log(`Looking up ${raw.toUpperCase()}...`);
    const quote = await searchTicker(raw, searchChain);
    if (!quote) {
      console.error(`Ticker ${raw.toUpperCase()} not found.`);
      process.exit(1);
    }

    const alerts = await createAlerts(store, ownerId, quote, { target, direction, lowerTarget });

    const sym = currencySymbol(quote.currency);
    console.log(`\n${alerts.length === 1 ? "Alert" : "Alerts"} added for ${quote.ticker} (${quote.companyName}, ${quote.exchange}):`);
    console.log(`  Current:   ${quote.price.toFixed(2)} ${sym}`);
    for (const alert of alerts) {
      console.log(`  ${alert.id}  ${alert.direction === "above" ? "▲" : "▼"} ${alert.targetPrice.toFixed(2)} ${sym}`);
    }
  });

program
  .command("list")
  .description("List this owner's alerts")
  .action(async () => {
    const ownerId = ownerOption();
    const alerts = await store.listAlerts(ownerId);
    if (alerts.length === 0) {
      console.log("No alerts configured. Use 'add' to create one.");
      return;
    }

    console.log(`\n${"ID".padEnd(38)} ${"Ticker".padEnd(10)} ${"Exchange".padEnd(10)} ${"Target".padEnd(14)} ${"Last".padEnd(12)} ${"Active".padEnd(7)} Last Checked`);
    console.log("-".repeat(115));

    for (const a of alerts) {
      const sym = currencySymbol(a.currency);
      const arrow = a.direction === "above" ? "▲" : "▼";
      const target = `${arrow} ${a.targetPrice.toFixed(2)} ${sym}`;
      const last = a.currentPrice != null ? `${a.currentPrice.toFixed(2)} ${sym}` : "-";
      const checked = a.lastCheckedAt ? new Date(a.lastCheckedAt).toLocaleString() : "Never";
      console.log(
        `${a.id.padEnd(38)} ${a.ticker.padEnd(10)} ${a.exchange.padEnd(10)} ${target.padEnd(14)} ${last.padEnd(12)} ${(a.active ? "Yes" : "No").padEnd(7)} ${checked}`
      );
    }
    console.log();
  });

program
  .command("remove <id>")
  .description("Remove an alert")
  .action(async (id: string) => {
    const ownerId = ownerOption();
    const removed = await store.removeAlert(id, ownerId);
    if (removed) {
      console.log(`Alert ${id} removed.`);
    } else {
      console.error(`Alert ${id} not found.`);
      process.exit(1);
    }
  });

program
  .command("retarget <id>")
  .description("Move an alert to a new target and re-arm it")
  .requiredOption("--target <price>", "New target price")
  .action(async (id: string, opts: { target: string }) => {
    const ownerId = ownerOption();
    const target = parsePositive(opts.target, "--target");
    const alert = await store.getAlert(id);
    if (!alert || alert.ownerId !== ownerId) {
      console.error(`Alert ${id} not found.`);
      process.exit(1);
    }

    const { direction } = await moveTarget(store, ctx, alert, target);
    console.log(`Alert ${id} now fires ${direction} ${target.toFixed(2)} ${currencySymbol(alert.currency)}.`);
  });

program
  .command("closest")
  .description("List alerts by distance to their target, using the last stored prices")
  .action(async () => {
    const ranked = rankByProximity(await store.listAlerts(ownerOption()));
    if (ranked.length === 0) {
      console.log("No alerts configured. Use 'add' to create one.");
      return;
    }

    for (const { alert, progressPct, distancePct } of ranked) {
      const sym = currencySymbol(alert.currency);
      const current = alert.currentPrice != null ? `${alert.currentPrice.toFixed(2)} ${sym}` : "-";
      const arrow = alert.direction === "above" ? "▲" : "▼";
      console.log(`${alert.ticker} (${alert.companyName})${alert.active ? "" : " [fired]"}`);
      console.log(`  Now ${current}, target ${arrow} ${alert.targetPrice.toFixed(2)} ${sym}`);
      if (progressPct != null && distancePct != null) {
        console.log(`  ${progressBar(progressPct)} ${progressPct.toFixed(1)}%  ${distancePct.toFixed(1)}% to go`);
      }
    }
  });

program
  .command("settings")
  .description("Show or change refresh intervals")
  .option("--domestic <seconds>", "Refresh interval for domestic alerts")
  .option("--foreign <seconds>", "Refresh interval for foreign alerts")
  .action(async (opts: { domestic?: string; foreign?: string }) => {
    const ownerId = ownerOption();
    const settings =
      opts.domestic == null && opts.foreign == null
        ? await store.getOwnerSettings(ownerId)
        : await store.upsertOwnerSettings(ownerId, {
            intervalDomesticSec: opts.domestic != null ? Math.round(parsePositive(opts.domestic, "--domestic")) : undefined,
            intervalForeignSec: opts.foreign != null ? Math.round(parsePositive(opts.foreign, "--foreign")) : undefined,
          });
    console.log(`Domestic interval: ${settings.intervalDomesticSec}s`);
    console.log(`Foreign interval:  ${settings.intervalForeignSec}s`);
  });

try {
  await program.parseAsync();
} finally {
  await pool.end();
}
