/**
 * Device state tables reported in the State (50) response, and the
 * decoders mapping their raw bytes. A code missing from a table raises
 * UnknownStateCodeError; nothing is substituted.
 */

import { UnknownStateCodeError, type StateDomain } from "./errors.js";

// ---------- Enums ----------

export enum TransmissionState {
  Ok = 0,
  CommandNotImplemented = 51,
  VariableDoesNotExist = 52,
  VariableOutOfRange = 53,
  EepromNotAccessible = 54,
  NotToggledServiceMode = 55,
  InternalMicroUnreachable = 56,
  CommandNotExecuted = 57,
  VariableNotAvailable = 58,
}

export enum GlobalState {
  SendingParameters = 0,
  WaitSunGrid = 1,
  CheckingGrid = 2,
  MeasuringRiso = 3,
  DcDcStart = 4,
  InverterStart = 5,
  Run = 6,
  Recovery = 7,
  Pause = 8,
  GroundFault = 9,
  OthFault = 10,
  AddressSetting = 11,
  SelfTest = 12,
  SelfTestFail = 13,
  SensorTestMeasRiso = 14,
  LeakFault = 15,
  WaitingManualReset = 16,
  InternalErrorE026 = 17,
  InternalErrorE027 = 18,
  InternalErrorE028 = 19,
  InternalErrorE029 = 20,
  InternalErrorE030 = 21,
  SendingWindTable = 22,
  FailedSendingTable = 23,
  UthFault = 24,
  RemoteOff = 25,
  InterlockFail = 26,
  ExecutingAutotest = 27,
  WaitingSun = 30,
  TemperatureFault = 31,
  FanStaucked = 32,
  IntComFault = 33,
  SlaveInsertion = 34,
  DcSwitchOpen = 35,
  TrasSwitchOpen = 36,
  MasterExclusion = 37,
  AutoExclusion = 38,
  ErasingInternalEeprom = 98,
  ErasingExternalEeprom = 99,
  CountingEeprom = 100,
  Freeze = 101,
}

export enum InverterState {
  StandBy = 0,
  CheckingGrid = 1,
  Run = 2,
  BulkOv = 3,
  OutOc = 4,
  IgbtSat = 5,
  BulkUv = 6,
  DegaussError = 7,
  NoParameters = 8,
  BulkLow = 9,
  GridOv = 10,
  CommunicationError = 11,
  Degaussing = 12,
  Starting = 13,
  BulkCapFail = 14,
  LeakFail = 15,
  DcDcFail = 16,
  IleakSensorFail = 17,
  SelfTestRelayInverter = 18,
  SelfTestWaitSensorTest = 19,
  SelfTestRelayDcDcSensor = 20,
  SelfTestRelayInverterFail = 21,
  SelfTestTimeoutFail = 22,
  SelfTestRelayDcDcFail = 23,
  SelfTest1 = 24,
  WaitingSelfTestStart = 25,
  DcInjection = 26,
  SelfTest2 = 27,
  SelfTest3 = 28,
  SelfTest4 = 29,
  InternalError30 = 30,
  InternalError31 = 31,
  ForbiddenState = 40,
  InputUc = 41,
  ZeroPower = 42,
  GridNotPresent = 43,
  WaitingStart = 44,
  Mppt = 45,
  GridFail = 46,
  InputOc = 47,
}

export enum DcDcState {
  Off = 0,
  RampStart = 1,
  Mppt = 2,
  NotUsed = 3,
  InputOc = 4,
  InputUv = 5,
  InputOv = 6,
  InputLow = 7,
  NoParameters = 8,
  BulkOv = 9,
  CommunicationError = 10,
  RampFail = 11,
  InternalError = 12,
  InputModeError = 13,
  GroundFault = 14,
  InverterFail = 15,
  IgbtSat = 16,
  IleakFail = 17,
  GridFail = 18,
  CommError = 19,
}

// ---------- Decoders ----------

const TRANSMISSION_CODES: ReadonlySet<TransmissionState> = new Set(
  Object.values(TransmissionState).filter(
    (v): v is TransmissionState => typeof v === "number"
  )
);
const GLOBAL_CODES: ReadonlySet<GlobalState> = new Set(
  Object.values(GlobalState).filter((v): v is GlobalState => typeof v === "number")
);
const INVERTER_CODES: ReadonlySet<InverterState> = new Set(
  Object.values(InverterState).filter((v): v is InverterState => typeof v === "number")
);
const DCDC_CODES: ReadonlySet<DcDcState> = new Set(
  Object.values(DcDcState).filter((v): v is DcDcState => typeof v === "number")
);

function isCode<E extends number>(codes: ReadonlySet<E>, raw: number): raw is E {
  const known: ReadonlySet<number> = codes;
  return known.has(raw);
}

function decodeCode<E extends number>(
  codes: ReadonlySet<E>,
  domain: StateDomain,
  raw: number
): E {
  if (isCode(codes, raw)) return raw;
  throw new UnknownStateCodeError(domain, raw);
}

export function decodeTransmissionState(raw: number): TransmissionState {
  return decodeCode(TRANSMISSION_CODES, "transmission", raw);
}

export function decodeGlobalState(raw: number): GlobalState {
  return decodeCode(GLOBAL_CODES, "global", raw);
}

export function decodeInverterState(raw: number): InverterState {
  return decodeCode(INVERTER_CODES, "inverter", raw);
}

export function decodeDcDcState(raw: number): DcDcState {
  return decodeCode(DCDC_CODES, "dcdc", raw);
}

/** Split a PascalCase member name into words ("WaitSunGrid" → "Wait Sun Grid") */
function label(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1 $2");
}

export const describeTransmissionState = (s: TransmissionState): string =>
  label(TransmissionState[s]);
export const describeGlobalState = (s: GlobalState): string => label(GlobalState[s]);
export const describeInverterState = (s: InverterState): string =>
  label(InverterState[s]);
export const describeDcDcState = (s: DcDcState): string => label(DcDcState[s]);
