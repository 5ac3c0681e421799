import { describe, expect, it } from "vitest";
import { CalibrationController, CALIBRATION_LOCATIONS } from "../calibration.js";
import { CalibrationStateError, PersistenceError } from "../errors.js";
import { FingerprintStore } from "../fingerprint-store.js";
import { MemoryPreferences } from "../preferences.js";

class FlakyPreferences extends MemoryPreferences {
  failNext = false;

  async setStringList(key: string, values: string[]): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new PersistenceError("persistence_write", "write refused");
    }
    await super.setStringList(key, values);
  }
}

function setup() {
  const prefs = new FlakyPreferences();
  const store = new FingerprintStore(prefs);
  return { prefs, store, controller: new CalibrationController(store) };
}

describe("CalibrationController", () => {
  it("starts idle", () => {
    const { controller } = setup();
    expect(controller.status()).toEqual({ active: false, room: null, location: null, index: 0, total: 5 });
  });

  it("rejects an empty room name", () => {
    const { controller } = setup();
    expect(() => controller.startCalibration("   ")).toThrow(CalibrationStateError);
    expect(controller.active).toBe(false);
  });

  it("rejects capture while idle", async () => {
    const { controller, store } = setup();
    await expect(controller.captureLocation({ ap1: -40 })).rejects.toBeInstanceOf(CalibrationStateError);
    expect(store.size).toBe(0);
  });

  it("walks every location once and returns to idle", async () => {
    const { controller, store } = setup();
    expect(controller.startCalibration(" Office ")).toBe("corner1");
    expect(controller.targetRoom).toBe("Office");

    const nexts: string[] = [];
    for (let i = 0; i < CALIBRATION_LOCATIONS.length - 1; i += 1) {
      expect(controller.status().index).toBe(i);
      const result = await controller.captureLocation({ ap1: -40 - i });
      expect(result.done).toBe(false);
      if (!result.done) nexts.push(result.next);
    }
    expect(nexts).toEqual(["corner2", "corner3", "corner4", "center"]);

    const last = await controller.captureLocation({ ap1: -50 });
    expect(last).toEqual({ done: true, captured: { room: "Office", location: "center", signals: { ap1: -50 } } });
    expect(controller.status()).toEqual({ active: false, room: null, location: null, index: 0, total: 5 });
    expect(store.fingerprintsFor("Office").map((fp) => fp.location)).toEqual([...CALIBRATION_LOCATIONS]);
  });

  it("replaces a location captured again in a new session", async () => {
    const { controller, store } = setup();
    controller.startCalibration("Kitchen");
    await controller.captureLocation({ ap1: -50 });
    controller.startCalibration("Kitchen");
    await controller.captureLocation({ ap1: -58 });

    expect(store.size).toBe(1);
    expect(store.fingerprints()[0]).toEqual({ room: "Kitchen", location: "corner1", signals: { ap1: -58 } });
  });

  it("overwrites a running session when started again", async () => {
    const { controller } = setup();
    controller.startCalibration("Kitchen");
    await controller.captureLocation({ ap1: -50 });
    controller.startCalibration("Office");
    expect(controller.status()).toEqual({ active: true, room: "Office", location: "corner1", index: 0, total: 5 });
  });

  it("stays on the same location when persistence fails", async () => {
    const { controller, prefs, store } = setup();
    controller.startCalibration("Kitchen");
    prefs.failNext = true;
    await expect(controller.captureLocation({ ap1: -50 })).rejects.toThrow("write refused");
    expect(controller.currentLocation).toBe("corner1");
    expect(store.size).toBe(1);

    const retry = await controller.captureLocation({ ap1: -51 });
    expect(retry.done).toBe(false);
    expect(store.size).toBe(1);
    expect(controller.currentLocation).toBe("corner2");
  });

  it("rejects a capture meant for a replaced session", async () => {
    const { controller, store } = setup();
    controller.startCalibration("Kitchen");
    const kitchenSession = controller.sessionId ?? -1;
    controller.startCalibration("Office");

    await expect(controller.captureLocation({ ap1: -40 }, kitchenSession)).rejects.toThrow(
      "calibration session changed before the capture completed",
    );
    expect(store.size).toBe(0);
    expect(controller.status()).toMatchObject({ room: "Office", index: 0 });
  });

  it("keeps captured fingerprints when cancelled", async () => {
    const { controller, store } = setup();
    controller.startCalibration("Kitchen");
    await controller.captureLocation({ ap1: -50 });
    controller.cancelCalibration();
    expect(controller.active).toBe(false);
    expect(store.rooms()).toEqual(["Kitchen"]);
  });

  it("accepts a custom location sequence", async () => {
    const store = new FingerprintStore(new MemoryPreferences());
    const controller = new CalibrationController(store, ["door", "window"]);
    controller.startCalibration("Hall");
    expect(await controller.captureLocation({})).toEqual({
      done: false,
      captured: { room: "Hall", location: "door", signals: {} },
      next: "window",
    });
    expect((await controller.captureLocation({})).done).toBe(true);
  });
});
