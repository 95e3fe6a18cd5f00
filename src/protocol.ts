/**
 * Aurora protocol data model: command codes, measurement table, requests
 * and the responses decoded against them.
 */

import type {
  DcDcState,
  GlobalState,
  InverterState,
  TransmissionState,
} from "./states.js";

// ---------- Frame sizes ----------

export const REQUEST_FRAME_LENGTH = 10;
export const RESPONSE_FRAME_LENGTH = 8;

// ---------- Command codes ----------

export const CommandCode = {
  STATE: 50,
  PART_NUMBER: 52,
  VERSION: 58,
  MEASURE: 59,
  SERIAL_NUMBER: 63,
  MANUFACTURE_DATE: 65,
  CUMULATIVE_ENERGY: 78,
} as const;

export type CommandCodeValue = (typeof CommandCode)[keyof typeof CommandCode];

// ---------- Enumerations ----------

/** Quantities readable with the Measure (59) command. */
export enum MeasurementType {
  GridVoltage = 1,
  GridCurrent = 2,
  GridPower = 3,
  Frequency = 4,
  Vbulk = 5,
  IleakDcDc = 6,
  IleakInverter = 7,
  Pin1 = 8,
  Pin2 = 9,
  InverterTemperature = 21,
  BoosterTemperature = 22,
  Input1Voltage = 23,
  Input1Current = 25,
  Input2Voltage = 26,
  Input2Current = 27,
  GridVoltageDcDc = 28,
  GridFrequencyDcDc = 29,
  IsolationResistance = 30,
  VbulkDcDc = 31,
  AverageGridVoltage = 32,
  VbulkMid = 33,
  PeakPower = 34,
  PeakPowerToday = 35,
  GridVoltageNeutral = 36,
  WindGeneratorFrequency = 37,
  GridVoltageNeutralPhase = 38,
  GridCurrentPhaseR = 39,
  GridCurrentPhaseS = 40,
  GridCurrentPhaseT = 41,
  FrequencyPhaseR = 42,
  FrequencyPhaseS = 43,
  FrequencyPhaseT = 44,
  VbulkPositive = 45,
  VbulkNegative = 46,
  SupervisorTemperature = 47,
  AlimTemperature = 48,
  HeatSinkTemperature = 49,
  Temperature1 = 50,
  Temperature2 = 51,
  Temperature3 = 52,
  FanSpeed1 = 53,
  FanSpeed2 = 54,
  FanSpeed3 = 55,
  FanSpeed4 = 56,
  FanSpeed5 = 57,
  PowerSaturationLimit = 58,
  ReferenceRingBulk = 59,
  VpanelMicro = 60,
  GridVoltagePhaseR = 61,
  GridVoltagePhaseS = 62,
  GridVoltagePhaseT = 63,
}

/** Periods for the cumulated energy (78) command. Code 2 is reserved. */
export enum CumulativeDuration {
  Daily = 0,
  Weekly = 1,
  Monthly = 3,
  Yearly = 4,
  Total = 5,
  SinceReset = 6,
}

export const MEASUREMENT_TYPES: readonly MeasurementType[] = Object.values(
  MeasurementType
).filter((v): v is MeasurementType => typeof v === "number");

export const CUMULATIVE_DURATIONS: readonly CumulativeDuration[] = Object.values(
  CumulativeDuration
).filter((v): v is CumulativeDuration => typeof v === "number");

/** "input1-voltage", "Input1_Voltage" and "input1voltage" all match */
function normalizeName(name: string): string {
  return name.replace(/[-_\s]/g, "").toLowerCase();
}

/** Parse a measurement type from its enum name or numeric code. */
export function parseMeasurementType(name: string): MeasurementType | undefined {
  const code = Number(name);
  if (name.trim() !== "" && Number.isInteger(code)) {
    return MEASUREMENT_TYPES.find((t) => t === code);
  }
  const wanted = normalizeName(name);
  return MEASUREMENT_TYPES.find((t) => normalizeName(MeasurementType[t]) === wanted);
}

export function parseCumulativeDuration(name: string): CumulativeDuration | undefined {
  const wanted = normalizeName(name);
  return CUMULATIVE_DURATIONS.find(
    (d) => normalizeName(CumulativeDuration[d]) === wanted
  );
}

// ---------- Requests ----------

export interface StateRequest {
  readonly kind: "state";
}
export interface PartNumberRequest {
  readonly kind: "partNumber";
}
export interface VersionRequest {
  readonly kind: "version";
}
export interface MeasureRequest {
  readonly kind: "measure";
  readonly type: MeasurementType;
  /** true = global value, false = single module / string value */
  readonly global: boolean;
}
export interface SerialNumberRequest {
  readonly kind: "serialNumber";
}
export interface ManufactureDateRequest {
  readonly kind: "manufactureDate";
}
export interface CumulativeEnergyRequest {
  readonly kind: "cumulativeEnergy";
  readonly duration: CumulativeDuration;
}

export type Request =
  | StateRequest
  | PartNumberRequest
  | VersionRequest
  | MeasureRequest
  | SerialNumberRequest
  | ManufactureDateRequest
  | CumulativeEnergyRequest;

export type RequestKind = Request["kind"];

/** Request constructors */
export const Request = {
  state: (): StateRequest => ({ kind: "state" }),
  partNumber: (): PartNumberRequest => ({ kind: "partNumber" }),
  version: (): VersionRequest => ({ kind: "version" }),
  measure: (type: MeasurementType, global = true): MeasureRequest => ({
    kind: "measure",
    type,
    global,
  }),
  serialNumber: (): SerialNumberRequest => ({ kind: "serialNumber" }),
  manufactureDate: (): ManufactureDateRequest => ({ kind: "manufactureDate" }),
  cumulativeEnergy: (duration: CumulativeDuration): CumulativeEnergyRequest => ({
    kind: "cumulativeEnergy",
    duration,
  }),
} as const;

export const COMMAND_CODES: Record<RequestKind, CommandCodeValue> = {
  state: CommandCode.STATE,
  partNumber: CommandCode.PART_NUMBER,
  version: CommandCode.VERSION,
  measure: CommandCode.MEASURE,
  serialNumber: CommandCode.SERIAL_NUMBER,
  manufactureDate: CommandCode.MANUFACTURE_DATE,
  cumulativeEnergy: CommandCode.CUMULATIVE_ENERGY,
};

export function describeRequest(request: Request): string {
  switch (request.kind) {
    case "measure":
      return `measure(${MeasurementType[request.type]}, ${request.global ? "global" : "module"})`;
    case "cumulativeEnergy":
      return `cumulativeEnergy(${CumulativeDuration[request.duration]})`;
    default:
      return request.kind;
  }
}

// ---------- Responses ----------

/** Leading status bytes reported by every response except the identifiers */
export interface StatusHeader {
  readonly transmission: number;
  readonly global: number;
}

export interface StateResponse extends StatusHeader {
  readonly kind: "state";
  readonly transmissionState: TransmissionState;
  readonly globalState: GlobalState;
  readonly inverterState: InverterState;
  readonly dc1State: DcDcState;
  readonly dc2State: DcDcState;
  readonly alarm: number;
}

export interface PartNumberResponse {
  readonly kind: "partNumber";
  readonly bytes: Buffer;
  readonly text: string;
}

export interface VersionResponse extends StatusHeader {
  readonly kind: "version";
  readonly parameters: readonly [number, number, number, number];
}

export interface MeasureResponse extends StatusHeader {
  readonly kind: "measure";
  readonly type: MeasurementType;
  readonly value: number;
}

export interface SerialNumberResponse {
  readonly kind: "serialNumber";
  readonly bytes: Buffer;
  readonly text: string;
}

export interface ManufactureDateResponse extends StatusHeader {
  readonly kind: "manufactureDate";
  readonly week: Buffer;
  readonly year: Buffer;
  readonly weekText: string;
  readonly yearText: string;
}

export interface CumulativeEnergyResponse extends StatusHeader {
  readonly kind: "cumulativeEnergy";
  readonly duration: CumulativeDuration;
  readonly value: number;
}

export type Response =
  | StateResponse
  | PartNumberResponse
  | VersionResponse
  | MeasureResponse
  | SerialNumberResponse
  | ManufactureDateResponse
  | CumulativeEnergyResponse;

/** Response type matching a given request kind */
export type ResponseFor<K extends RequestKind> = Extract<Response, { kind: K }>;

export function isResponseFor<K extends RequestKind>(
  response: Response,
  kind: K
): response is ResponseFor<K> {
  return response.kind === kind;
}
