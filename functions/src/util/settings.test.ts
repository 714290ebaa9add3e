import { describe, it, expect } from "vitest";
import { resolveGrocerySettings } from "./settings";

describe("resolveGrocerySettings", () => {
  it("prefers explicit values over everything else", () => {
    expect(
      resolveGrocerySettings({
        explicit: { zip: "45202", locationId: "01400943" },
        env: { KROGER_ZIP: "48837", KROGER_LOCATION_ID: "01400376" },
        stored: { zip: "10001", locationId: "01400999" },
      })
    ).toEqual({ zip: "45202", locationId: "01400943" });
  });

  it("falls back to the environment, then stored settings", () => {
    expect(
      resolveGrocerySettings({
        explicit: {},
        env: { KROGER_ZIP: "48837" },
        stored: { zip: "10001", locationId: "01400999" },
      })
    ).toEqual({ zip: "48837", locationId: "01400999" });
  });

  it("treats blank values as unset", () => {
    expect(
      resolveGrocerySettings({
        explicit: { zip: "  " },
        env: { KROGER_ZIP: "" },
        stored: { zip: "10001" },
      })
    ).toEqual({ zip: "10001", locationId: undefined });
  });

  it("leaves everything unset when no source has a value", () => {
    expect(resolveGrocerySettings({ env: {} })).toEqual({ zip: undefined, locationId: undefined });
  });
});
