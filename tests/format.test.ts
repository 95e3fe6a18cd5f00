import { describe, it, expect } from "vitest";
import { parseRequest, summarizeResponse } from "../src/format.js";
import {
  CumulativeDuration,
  MeasurementType,
  parseCumulativeDuration,
  parseMeasurementType,
} from "../src/protocol.js";
import { DcDcState, GlobalState, InverterState, TransmissionState } from "../src/states.js";

describe("parseMeasurementType", () => {
  it("should accept names in any case and separator style", () => {
    expect(parseMeasurementType("input1-voltage")).toBe(MeasurementType.Input1Voltage);
    expect(parseMeasurementType("Input1_Voltage")).toBe(MeasurementType.Input1Voltage);
    expect(parseMeasurementType("GRIDPOWER")).toBe(MeasurementType.GridPower);
  });

  it("should accept numeric codes that exist", () => {
    expect(parseMeasurementType("23")).toBe(MeasurementType.Input1Voltage);
    expect(parseMeasurementType("24")).toBeUndefined();
  });

  it("should return undefined for unknown names", () => {
    expect(parseMeasurementType("sunshine")).toBeUndefined();
    expect(parseMeasurementType("")).toBeUndefined();
  });
});

describe("parseCumulativeDuration", () => {
  it("should map period names", () => {
    expect(parseCumulativeDuration("daily")).toBe(CumulativeDuration.Daily);
    expect(parseCumulativeDuration("since-reset")).toBe(CumulativeDuration.SinceReset);
    expect(parseCumulativeDuration("fortnightly")).toBeUndefined();
  });
});

describe("parseRequest", () => {
  it("should build requests without arguments", () => {
    expect(parseRequest("state")).toEqual({ kind: "state" });
    expect(parseRequest("part-number")).toEqual({ kind: "partNumber" });
    expect(parseRequest("manufacture-date")).toEqual({ kind: "manufactureDate" });
  });

  it("should build a measure request", () => {
    expect(parseRequest("measure", "grid_power", false)).toEqual({
      kind: "measure",
      type: MeasurementType.GridPower,
      global: false,
    });
  });

  it("should default the energy period to daily", () => {
    expect(parseRequest("energy")).toEqual({
      kind: "cumulativeEnergy",
      duration: CumulativeDuration.Daily,
    });
    expect(parseRequest("energy", "total")).toEqual({
      kind: "cumulativeEnergy",
      duration: CumulativeDuration.Total,
    });
  });

  it("should reject unknown requests and arguments", () => {
    expect(() => parseRequest("reboot")).toThrow("Unknown request: reboot");
    expect(() => parseRequest("measure")).toThrow("Unknown measurement type: (none)");
    expect(() => parseRequest("energy", "fortnightly")).toThrow("Unknown energy period: fortnightly");
  });
});

describe("summarizeResponse", () => {
  it("should name the states of a state response", () => {
    expect(
      summarizeResponse({
        kind: "state",
        transmission: 0,
        global: 1,
        transmissionState: TransmissionState.Ok,
        globalState: GlobalState.WaitSunGrid,
        inverterState: InverterState.StandBy,
        dc1State: DcDcState.Off,
        dc2State: DcDcState.RampStart,
        alarm: 0,
      })
    ).toEqual({
      kind: "state",
      transmission: "Ok",
      global: "Wait Sun Grid",
      inverter: "Stand By",
      dc1: "Off",
      dc2: "Ramp Start",
      alarm: 0,
    });
  });

  it("should show identifiers as text and hex", () => {
    expect(
      summarizeResponse({
        kind: "serialNumber",
        bytes: Buffer.from("123456", "latin1"),
        text: "123456",
      })
    ).toEqual({ kind: "serialNumber", text: "123456", hex: "313233343536" });
  });

  it("should name the measurement and period", () => {
    expect(
      summarizeResponse({
        kind: "measure",
        transmission: 0,
        global: 6,
        type: MeasurementType.Input1Voltage,
        value: 230.5,
      })
    ).toEqual({
      kind: "measure",
      transmission: 0,
      global: 6,
      type: "Input1Voltage",
      value: 230.5,
    });

    expect(
      summarizeResponse({
        kind: "cumulativeEnergy",
        transmission: 0,
        global: 6,
        duration: CumulativeDuration.Weekly,
        value: 42,
      })
    ).toEqual({
      kind: "cumulativeEnergy",
      transmission: 0,
      global: 6,
      duration: "Weekly",
      value: 42,
    });
  });
});
