import { describe, it, expect } from "vitest";
import { splitDeviceTime } from "./device-time.js";

describe("splitDeviceTime", () => {
  it("splits date and time", () => {
    expect(splitDeviceTime("2021-03-17T08:33:00")).toEqual({
      date: "2021-03-17",
      time: "08:33:00",
    });
  });

  it("ignores fractional seconds and offsets", () => {
    expect(splitDeviceTime("2021-03-17T23:59:59.123+02:00")).toEqual({
      date: "2021-03-17",
      time: "23:59:59",
    });
  });

  it("returns null when the time part is cut short", () => {
    expect(splitDeviceTime("2021-03-17T08:33")).toBeNull();
    expect(splitDeviceTime("")).toBeNull();
  });
});
