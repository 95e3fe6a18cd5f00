/**
 * Text forms of requests and responses, used by the CLI.
 */

import {
  CumulativeDuration,
  MeasurementType,
  Request,
  parseCumulativeDuration,
  parseMeasurementType,
  type Response,
} from "./protocol.js";
import {
  describeDcDcState,
  describeGlobalState,
  describeInverterState,
  describeTransmissionState,
} from "./states.js";

/** Build a request from its CLI name ("measure input1-voltage", "energy weekly", ...) */
export function parseRequest(name: string, arg?: string, global = true): Request {
  switch (name) {
    case "state":
      return Request.state();
    case "part-number":
      return Request.partNumber();
    case "version":
      return Request.version();
    case "serial-number":
      return Request.serialNumber();
    case "manufacture-date":
      return Request.manufactureDate();
    case "measure": {
      const type = arg === undefined ? undefined : parseMeasurementType(arg);
      if (type === undefined) {
        throw new RangeError(`Unknown measurement type: ${arg ?? "(none)"}`);
      }
      return Request.measure(type, global);
    }
    case "energy": {
      const duration =
        arg === undefined ? CumulativeDuration.Daily : parseCumulativeDuration(arg);
      if (duration === undefined) {
        throw new RangeError(`Unknown energy period: ${arg}`);
      }
      return Request.cumulativeEnergy(duration);
    }
    default:
      throw new RangeError(`Unknown request: ${name}`);
  }
}

export type ResponseSummary = Record<string, string | number | number[]>;

/** Flatten a response into JSON-friendly values with readable state names */
export function summarizeResponse(response: Response): ResponseSummary {
  switch (response.kind) {
    case "state":
      return {
        kind: response.kind,
        transmission: describeTransmissionState(response.transmissionState),
        global: describeGlobalState(response.globalState),
        inverter: describeInverterState(response.inverterState),
        dc1: describeDcDcState(response.dc1State),
        dc2: describeDcDcState(response.dc2State),
        alarm: response.alarm,
      };
    case "partNumber":
    case "serialNumber":
      return {
        kind: response.kind,
        text: response.text,
        hex: response.bytes.toString("hex"),
      };
    case "version":
      return {
        kind: response.kind,
        transmission: response.transmission,
        global: response.global,
        parameters: [...response.parameters],
      };
    case "measure":
      return {
        kind: response.kind,
        transmission: response.transmission,
        global: response.global,
        type: MeasurementType[response.type],
        value: response.value,
      };
    case "manufactureDate":
      return {
        kind: response.kind,
        transmission: response.transmission,
        global: response.global,
        week: response.weekText,
        year: response.yearText,
      };
    case "cumulativeEnergy":
      return {
        kind: response.kind,
        transmission: response.transmission,
        global: response.global,
        duration: CumulativeDuration[response.duration],
        value: response.value,
      };
  }
}
