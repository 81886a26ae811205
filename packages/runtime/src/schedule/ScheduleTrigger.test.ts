import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileStateStore, InMemoryStateStore } from "@tickcast/persistence";
import { describe, expect, it } from "vitest";
import {
	FRI_FIRE,
	HOURLY,
	MARKET_DAILY,
	MON_EVENING,
	MON_FIRE,
	TEST_CALENDAR,
} from "../__tests__/harness";
import { ScheduleTrigger } from "./ScheduleTrigger";
import { WeekdayTradingCalendar } from "./tradingCalendar";

const calendar = new WeekdayTradingCalendar(TEST_CALENDAR);

describe("ScheduleTrigger", () => {
	it("fires the latest past instant on a first run", () => {
		const trigger = new ScheduleTrigger({
			cadences: [MARKET_DAILY],
			calendar,
			store: new InMemoryStateStore(),
		});

		expect(trigger.evaluate(MON_EVENING)).toEqual([
			{ cadence: MARKET_DAILY, instant: MON_FIRE },
		]);
	});

	it("fires only the most recent missed instant", () => {
		const thursdayFire = Date.UTC(2026, 9, 15, 20, 1, 30);
		const trigger = new ScheduleTrigger({
			cadences: [MARKET_DAILY],
			calendar,
			store: new InMemoryStateStore({ lastFired: { "market-daily": thursdayFire } }),
		});

		expect(trigger.evaluate(MON_EVENING)).toEqual([
			{ cadence: MARKET_DAILY, instant: MON_FIRE },
		]);
	});

	it("is idle once the instant was marked", async () => {
		const store = new InMemoryStateStore({ lastFired: { "market-daily": FRI_FIRE } });
		const trigger = new ScheduleTrigger({ cadences: [MARKET_DAILY], calendar, store });

		await trigger.markFired("market-daily", MON_FIRE);

		expect(trigger.evaluate(MON_EVENING)).toEqual([]);
	});

	it("does not re-fire a marked instant after a restart", async () => {
		const dir = await fs.mkdtemp(path.join(os.tmpdir(), "tickcast-trigger-"));
		try {
			const filePath = path.join(dir, "state.json");
			const before = new FileStateStore(filePath);
			await before.load();
			const first = new ScheduleTrigger({ cadences: [MARKET_DAILY], calendar, store: before });
			const [due] = first.evaluate(MON_EVENING);
			await first.markFired(MARKET_DAILY.id, due?.instant ?? 0);

			const after = new FileStateStore(filePath);
			await after.load();
			const restarted = new ScheduleTrigger({
				cadences: [MARKET_DAILY],
				calendar,
				store: after,
			});

			expect(restarted.evaluate(MON_EVENING)).toEqual([]);
			expect(restarted.evaluate(MON_EVENING + 86_400_000)).toEqual([
				{ cadence: MARKET_DAILY, instant: MON_FIRE + 86_400_000 },
			]);
		} finally {
			await fs.rm(dir, { recursive: true, force: true });
		}
	});

	it("never moves a fired instant backwards", async () => {
		const store = new InMemoryStateStore({ lastFired: { "market-daily": MON_FIRE } });
		const trigger = new ScheduleTrigger({ cadences: [MARKET_DAILY], calendar, store });

		await trigger.markFired("market-daily", FRI_FIRE);

		expect(store.snapshot().lastFired).toEqual({ "market-daily": MON_FIRE });
		expect(store.writes).toBe(0);
	});

	it("reports the earliest upcoming instant across classes", () => {
		const trigger = new ScheduleTrigger({
			cadences: [MARKET_DAILY, HOURLY],
			calendar,
			store: new InMemoryStateStore(),
		});

		expect(trigger.nextTriggerAt(MON_EVENING)).toEqual({
			cadence: "hourly",
			instant: Date.UTC(2026, 9, 19, 21, 0, 30),
		});
		expect(trigger.nextTriggerAt(Date.UTC(2026, 9, 19, 20, 1))).toEqual({
			cadence: "market-daily",
			instant: MON_FIRE,
		});
	});

	it("reports where each class's unfinished bars begin", () => {
		const trigger = new ScheduleTrigger({
			cadences: [MARKET_DAILY, HOURLY],
			calendar,
			store: new InMemoryStateStore(),
		});

		expect(trigger.openBarsFrom("market-daily", MON_EVENING)).toBe(Date.UTC(2026, 9, 20));
		expect(trigger.openBarsFrom("hourly", MON_EVENING)).toBe(
			Date.UTC(2026, 9, 19, 19, 30) + 1
		);
		expect(() => trigger.openBarsFrom("weekly", MON_EVENING)).toThrowError(
			"Unknown cadence weekly"
		);
	});

	it("rejects duplicate cadence ids", () => {
		expect(
			() =>
				new ScheduleTrigger({
					cadences: [MARKET_DAILY, MARKET_DAILY],
					calendar,
					store: new InMemoryStateStore(),
				})
		).toThrowError("Duplicate cadence id market-daily");
	});
});
