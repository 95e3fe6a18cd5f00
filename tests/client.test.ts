import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";
import net from "node:net";
import { AuroraClient } from "../src/client.js";
import { addCrc } from "../src/crc.js";
import {
  ConnectionClosedError,
  ConnectionError,
  CrcMismatchError,
  IoError,
  PendingRequestError,
  TimeoutError,
} from "../src/errors.js";
import { CumulativeDuration, MeasurementType, Request } from "../src/protocol.js";
import { DcDcState, GlobalState, InverterState, TransmissionState } from "../src/states.js";
import {
  DAILY_ENERGY,
  INPUT1_VOLTAGE,
  TOTAL_ENERGY,
  close,
  createMockBridge,
  createStreamInverter,
  defaultDevice,
  listen,
  type DeviceHandler,
} from "./mock-inverter.js";

describe("AuroraClient over TCP", () => {
  let server: net.Server;
  let port: number;
  let client: AuroraClient;

  beforeAll(async () => {
    server = createMockBridge();
    port = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  afterEach(async () => {
    await client.disconnect();
  });

  it("should connect and disconnect", async () => {
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();
    expect(client.connected).toBe(true);
    await client.disconnect();
    expect(client.connected).toBe(false);
  });

  it("should read today's cumulated energy", async () => {
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();
    const response = await client.readCumulativeEnergy(CumulativeDuration.Daily);
    expect(response).toEqual({
      kind: "cumulativeEnergy",
      transmission: 0,
      global: 6,
      duration: CumulativeDuration.Daily,
      value: DAILY_ENERGY,
    });
  });

  it("should run requests one after another on one connection", async () => {
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();

    const voltage = await client.measure(MeasurementType.Input1Voltage);
    expect(voltage.value).toBe(INPUT1_VOLTAGE);

    const total = await client.readCumulativeEnergy(CumulativeDuration.Total);
    expect(total.value).toBe(TOTAL_ENERGY);

    const state = await client.readState();
    expect(state).toMatchObject({
      transmissionState: TransmissionState.Ok,
      globalState: GlobalState.Run,
      inverterState: InverterState.Run,
      dc1State: DcDcState.Mppt,
      dc2State: DcDcState.Mppt,
      alarm: 0,
    });
  });

  it("should read the identification fields", async () => {
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();

    expect((await client.readPartNumber()).text).toBe("-3G97-");
    expect((await client.readSerialNumber()).text).toBe("123456");
    expect((await client.readVersion()).parameters).toEqual([0x41, 0x42, 0x43, 0x44]);

    const date = await client.readManufactureDate();
    expect(date.weekText).toBe("12");
    expect(date.yearText).toBe("19");
  });

  it("should emit every decoded response", async () => {
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();

    const seen: string[] = [];
    client.on("response", (response: { kind: string }) => seen.push(response.kind));
    await client.readState();
    await client.readVersion();
    expect(seen).toEqual(["state", "version"]);
  });

  it("should refuse a request once disconnected", async () => {
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();
    await client.disconnect();
    await expect(client.readState()).rejects.toThrow("Connection already closed.");
  });
});

describe("AuroraClient failures over TCP", () => {
  let client: AuroraClient;
  const servers: net.Server[] = [];

  async function start(device: DeviceHandler): Promise<number> {
    const server = createMockBridge(device);
    servers.push(server);
    return listen(server);
  }

  afterEach(async () => {
    await client.disconnect();
    await Promise.all(servers.splice(0).map(close));
  });

  it("should fail to connect when nothing listens", async () => {
    const port = await start(defaultDevice);
    await close(servers[0]);
    servers.length = 0;

    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await expect(client.connect()).rejects.toBeInstanceOf(ConnectionError);
    expect(client.connected).toBe(false);
  });

  it("should reassemble a response split across TCP segments", async () => {
    const port = await start((request, connection) => {
      const reply = defaultDevice(request);
      if (reply) {
        connection.write(reply.subarray(0, 3));
        setTimeout(() => connection.write(reply.subarray(3)), 20);
      }
      return null;
    });
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();

    const response = await client.readCumulativeEnergy(CumulativeDuration.Daily);
    expect(response.value).toBe(DAILY_ENERGY);
  });

  it("should reject a corrupted response and drop the connection", async () => {
    const port = await start((request) => {
      const reply = defaultDevice(request);
      if (reply) reply[7] ^= 0xff;
      return reply;
    });
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();

    await expect(client.readState()).rejects.toBeInstanceOf(CrcMismatchError);
    expect(client.connected).toBe(false);
    await expect(client.readState()).rejects.toThrow(/^Connection already closed after: CRC mismatch/);
  });

  it("should time out when the inverter stays silent", async () => {
    const port = await start(() => null);
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();

    await expect(client.readState({ timeoutMs: 50 })).rejects.toThrow("No response within 50ms");
    expect(client.connected).toBe(false);
  });

  it("should reject when the bridge closes the connection mid-request", async () => {
    const port = await start((_request, connection) => {
      connection.destroy();
      return null;
    });
    client = new AuroraClient("127.0.0.1", { port, timeout: 5 });
    await client.connect();

    await expect(client.readState()).rejects.toBeInstanceOf(IoError);
    expect(client.connected).toBe(false);
  });
});

describe("AuroraClient over a stream", () => {
  it("should answer requests through any duplex stream", async () => {
    const client = AuroraClient.fromStream(createStreamInverter(), { address: 7 });
    const response = await client.measure(MeasurementType.Input1Voltage);
    expect(response).toEqual({
      kind: "measure",
      transmission: 0,
      global: 6,
      type: MeasurementType.Input1Voltage,
      value: INPUT1_VOLTAGE,
    });
    await client.disconnect();
  });

  it("should resolve request() with the response type of the request kind", async () => {
    const client = AuroraClient.fromStream(createStreamInverter());

    const energy = await client.request(Request.cumulativeEnergy(CumulativeDuration.Total));
    expect(energy.duration).toBe(CumulativeDuration.Total);
    expect(energy.value).toBe(TOTAL_ENERGY);

    const voltage = await client.request(Request.measure(MeasurementType.Input1Voltage));
    expect(voltage.type).toBe(MeasurementType.Input1Voltage);
    expect(voltage.value).toBe(INPUT1_VOLTAGE);
    await client.disconnect();
  });

  it("should address frames to the configured inverter", async () => {
    const written: Buffer[] = [];
    const stream = createStreamInverter((request) => {
      written.push(Buffer.from(request));
      return defaultDevice(request);
    });
    const client = AuroraClient.fromStream(stream, { address: 7 });
    await client.readState();
    expect(written.length).toBe(1);
    expect(written[0][0]).toBe(7);
    expect(written[0][1]).toBe(50);
    await client.disconnect();
  });

  it("should refuse a second request while one is outstanding", async () => {
    const client = AuroraClient.fromStream(createStreamInverter());
    const first = client.readCumulativeEnergy(CumulativeDuration.Daily);
    await expect(client.readVersion()).rejects.toBeInstanceOf(PendingRequestError);
    await expect(first).resolves.toMatchObject({ value: DAILY_ENERGY });
    await client.disconnect();
  });

  it("should reject with the abort reason and drop the connection", async () => {
    const client = AuroraClient.fromStream(createStreamInverter(() => null));
    const controller = new AbortController();
    const pending = client.readState({ signal: controller.signal, timeoutMs: 0 });
    controller.abort(new TimeoutError(10, "gave up"));

    await expect(pending).rejects.toThrow("gave up");
    expect(client.connected).toBe(false);
  });

  it("should not send anything for an already aborted signal", async () => {
    const written: Buffer[] = [];
    const stream = createStreamInverter((request) => {
      written.push(Buffer.from(request));
      return null;
    });
    const client = AuroraClient.fromStream(stream);
    const signal = AbortSignal.abort(new TimeoutError(0, "already aborted"));

    await expect(client.readState({ signal })).rejects.toThrow("already aborted");
    expect(written).toEqual([]);
    expect(client.connected).toBe(true);
    await client.disconnect();
  });

  it("should drop the connection on an unsolicited frame", async () => {
    const stream = createStreamInverter();
    const client = AuroraClient.fromStream(stream);
    const closed = new Promise<void>((resolve) => client.once("close", () => resolve()));

    stream.push(addCrc(Buffer.from([0, 6, 0, 0, 0, 0])));
    await closed;

    expect(client.connected).toBe(false);
    await expect(client.request(Request.state())).rejects.toThrow(
      "Connection already closed after: Got response without request"
    );
  });

  it("should reject an outstanding request on disconnect", async () => {
    const client = AuroraClient.fromStream(createStreamInverter(() => null));
    const pending = client.readState({ timeoutMs: 0 });
    const rejected = expect(pending).rejects.toThrow("Disconnected");
    await client.disconnect();
    await rejected;
    await expect(pending).rejects.toBeInstanceOf(ConnectionClosedError);
  });
});
