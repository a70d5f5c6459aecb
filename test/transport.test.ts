import dgram from "node:dgram";
import { PassThrough } from "node:stream";
import { afterEach, describe, expect, it, vi } from "vitest";
import { parseDestination } from "../src/destination";
import { isCotWireError } from "../src/errors";
import { PullReader, type ChannelPair } from "../src/transport/channel";
import { resolveTransport, type HostLookup } from "../src/transport/resolver";
import { connectTcp } from "../src/transport/stream-channel";
import { closedTcpPort, freeUdpPort, host, startTcpSink, type TcpSink } from "./helpers/net";

const expectRejectCode = async (promise: Promise<unknown>, code: string) => {
  const err = await promise.then(
    () => undefined,
    (error: unknown) => error,
  );
  expect(isCotWireError(err)).toBe(true);
  expect(isCotWireError(err) && err.code).toBe(code);
};

/** An address from TEST-NET-3 that no local interface carries. */
const FOREIGN_ADDRESS = "203.0.113.7";
const UNKNOWN_INTERFACE = "cotwire-nic9";

describe("PullReader", () => {
  it("should queue pushed chunks until read", async () => {
    const reader = new PullReader<string>();
    reader.push("a");
    reader.push("b");
    expect(await reader.read()).toBe("a");
    expect(await reader.read()).toBe("b");
  });

  it("should resolve pending reads on push and end", async () => {
    const reader = new PullReader<string>();
    const first = reader.read();
    const second = reader.read();
    reader.push("x");
    reader.end();
    expect(await first).toBe("x");
    expect(await second).toBeNull();
    expect(await reader.read()).toBeNull();
  });

  it("should drain buffered chunks before reporting the end", async () => {
    const reader = new PullReader<string>();
    reader.push("last");
    reader.end();
    reader.push("ignored");
    expect(await reader.read()).toBe("last");
    expect(await reader.read()).toBeNull();
  });

  it("should reject reads after a failure", async () => {
    const reader = new PullReader<string>();
    const pending = reader.read();
    reader.fail(new Error("reset"));
    await expect(pending).rejects.toThrow("reset");
    await expect(reader.read()).rejects.toThrow("reset");
  });

  it("should pause above the high-water mark and resume once drained", async () => {
    const pause = vi.fn();
    const resume = vi.fn();
    const reader = new PullReader<number>({ highWaterMark: 4, pause, resume });
    for (let i = 0; i < 4; i += 1) reader.push(i);
    expect(pause).toHaveBeenCalledTimes(1);

    await reader.read();
    expect(resume).not.toHaveBeenCalled();
    await reader.read();
    await reader.read();
    expect(resume).toHaveBeenCalledTimes(1);
  });
});

describe("resolveTransport: tcp", () => {
  let sink: TcpSink | undefined;
  let pair: ChannelPair | undefined;

  afterEach(async () => {
    await pair?.close();
    await sink?.close();
    pair = undefined;
    sink = undefined;
  });

  it("should exchange bytes with the peer", async () => {
    sink = await startTcpSink();
    pair = await resolveTransport(parseDestination(`tcp://${host}:${sink.port}`));
    expect(pair.reader?.kind).toBe("stream");

    await pair.writer?.write(Buffer.from("hello"));
    await sink.waitFor(data => data.toString() === "hello");

    sink.send("reply");
    const chunk = await pair.reader?.read();
    expect(chunk?.toString()).toBe("reply");
  });

  it("should report a peer hang-up as end of stream", async () => {
    sink = await startTcpSink();
    pair = await resolveTransport(parseDestination(`tcp://${host}:${sink.port}`));
    await pair.writer?.write(Buffer.from("x"));
    await sink.waitFor(data => data.length === 1);

    sink.hangUp();
    expect(await pair.reader?.read()).toBeNull();
  });

  it("should resolve hostnames through the lookup", async () => {
    sink = await startTcpSink();
    const lookup = vi.fn<HostLookup>(async () => ({ address: host, family: 4 }));
    pair = await resolveTransport(parseDestination(`tcp://takserver.test:${sink.port}`), {
      lookup,
    });
    expect(lookup).toHaveBeenCalledWith("takserver.test", { family: undefined });
    await pair.writer?.write(Buffer.from("via-lookup"));
    await sink.waitFor(data => data.toString() === "via-lookup");
  });

  it("should fail with E_ADDRESS when the host does not resolve", async () => {
    const lookup: HostLookup = async () => {
      throw new Error("ENOTFOUND");
    };
    await expectRejectCode(
      resolveTransport(parseDestination("tcp://nowhere.test:8087"), { lookup }),
      "E_ADDRESS",
    );
  });

  it("should fail with E_ADDRESS when nothing listens", async () => {
    const port = await closedTcpPort();
    await expectRejectCode(
      resolveTransport(parseDestination(`tcp://${host}:${port}`)),
      "E_ADDRESS",
    );
  });

  it("should fail with E_BIND when the local address is not ours", async () => {
    const port = await closedTcpPort();
    await expectRejectCode(
      resolveTransport(parseDestination(`tcp://${host}:${port}`), {
        localAddress: FOREIGN_ADDRESS,
      }),
      "E_BIND",
    );
  });

  it("should fail with E_BIND when the local interface does not exist", async () => {
    const port = await closedTcpPort();
    await expectRejectCode(
      resolveTransport(parseDestination(`tcp://${host}:${port}`), {
        localAddress: UNKNOWN_INTERFACE,
      }),
      "E_BIND",
    );
  });

  it("should map malformed local addresses to E_BIND when connecting directly", async () => {
    const port = await closedTcpPort();
    await expectRejectCode(
      connectTcp({ host, port, localAddress: UNKNOWN_INTERFACE }),
      "E_BIND",
    );
  });

  it("should require a client identity for tls", async () => {
    await expectRejectCode(
      resolveTransport(parseDestination(`tls://${host}:8089`)),
      "E_CERTIFICATE",
    );
  });

  it("should reject writes after close and close only once", async () => {
    sink = await startTcpSink();
    const opened = await resolveTransport(parseDestination(`tcp://${host}:${sink.port}`));
    pair = opened;
    const closing = opened.close();
    expect(opened.close()).toBe(closing);
    await closing;
    await expectRejectCode(opened.writer?.write(Buffer.from("late")) ?? Promise.resolve(), "E_CHANNEL_IO");
    expect(await opened.reader?.read()).toBeNull();
  });
});

describe("resolveTransport: udp", () => {
  const sockets: dgram.Socket[] = [];
  let pair: ChannelPair | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    await pair?.close();
    pair = undefined;
    await Promise.all(
      sockets.splice(0).map(socket => new Promise<void>(resolve => socket.close(() => resolve()))),
    );
  });

  const udpSink = async () => {
    const socket = dgram.createSocket("udp4");
    sockets.push(socket);
    await new Promise<void>(resolve => socket.bind(0, host, resolve));
    const messages: Array<{ data: Buffer; port: number }> = [];
    socket.on("message", (data: Buffer, rinfo: dgram.RemoteInfo) =>
      messages.push({ data, port: rinfo.port }),
    );
    return { socket, port: socket.address().port, messages };
  };

  const waitForMessage = async (messages: unknown[]) => {
    for (let i = 0; i < 200 && messages.length === 0; i += 1) {
      await new Promise(resolve => setTimeout(resolve, 10));
    }
  };

  it("should send and receive unicast datagrams", async () => {
    const sink = await udpSink();
    pair = await resolveTransport(parseDestination(`udp://${host}:${sink.port}`));
    expect(pair.reader?.kind).toBe("datagram");

    await pair.writer?.write(Buffer.from("ping"));
    await waitForMessage(sink.messages);
    expect(sink.messages[0]?.data.toString()).toBe("ping");

    const replyPort = sink.messages[0]?.port ?? 0;
    sink.socket.send(Buffer.from("pong"), replyPort, host);
    expect((await pair.reader?.read())?.toString()).toBe("pong");
  });

  it("should open write-only unicast without a reader", async () => {
    const sink = await udpSink();
    pair = await resolveTransport(parseDestination(`udp+wo://${host}:${sink.port}`));
    expect(pair.reader).toBeUndefined();
    await pair.writer?.write(Buffer.from("one-way"));
    await waitForMessage(sink.messages);
    expect(sink.messages[0]?.data.toString()).toBe("one-way");
  });

  it("should hear its own broadcast on loopback", async () => {
    const port = await freeUdpPort();
    pair = await resolveTransport(parseDestination(`udp+broadcast://${host}:${port}`));
    await pair.writer?.write(Buffer.from("all-call"));
    expect((await pair.reader?.read())?.toString()).toBe("all-call");
  });

  it("should send write-only broadcast without a reader", async () => {
    const sink = await udpSink();
    pair = await resolveTransport(parseDestination(`udp+broadcast+wo://${host}:${sink.port}`));
    expect(pair.reader).toBeUndefined();
    await pair.writer?.write(Buffer.from("net-call"));
    await waitForMessage(sink.messages);
    expect(sink.messages[0]?.data.toString()).toBe("net-call");
    expect(sink.messages[0]?.port).not.toBe(sink.port);
  });

  it("should join the group and hear its own read-write multicast", async () => {
    const port = await freeUdpPort();
    const join = vi.spyOn(dgram.Socket.prototype, "addMembership");
    pair = await resolveTransport(parseDestination(`udp://239.2.3.9:${port}`));
    expect(pair.destination.multicast).toBe(true);
    expect(join).toHaveBeenCalledWith("239.2.3.9", undefined);

    await pair.writer?.write(Buffer.from("mesh"));
    expect((await pair.reader?.read())?.toString()).toBe("mesh");
  });

  it("should send write-only multicast to group members", async () => {
    const port = await freeUdpPort();
    const group = "239.2.3.10";
    const member = dgram.createSocket({ type: "udp4", reuseAddr: true });
    sockets.push(member);
    await new Promise<void>(resolve => member.bind(port, "0.0.0.0", resolve));
    member.addMembership(group);
    const received: Buffer[] = [];
    member.on("message", (data: Buffer) => received.push(data));

    const ttl = vi.spyOn(dgram.Socket.prototype, "setMulticastTTL");
    const join = vi.spyOn(dgram.Socket.prototype, "addMembership");
    pair = await resolveTransport(parseDestination(`udp+wo://${group}:${port}`), {
      multicastTtl: 2,
    });
    expect(pair.reader).toBeUndefined();
    expect(ttl).toHaveBeenCalledWith(2);
    expect(join).not.toHaveBeenCalled();

    await pair.writer?.write(Buffer.from("sa-report"));
    await waitForMessage(received);
    expect(received[0]?.toString()).toBe("sa-report");
  });

  it("should send multicast from the configured interface address", async () => {
    const egress = vi.spyOn(dgram.Socket.prototype, "setMulticastInterface");
    const ttl = vi.spyOn(dgram.Socket.prototype, "setMulticastTTL");
    pair = await resolveTransport(parseDestination("udp+wo://239.2.3.11:6969"), {
      localAddress: host,
      multicastTtl: 3,
    });
    expect(egress).toHaveBeenCalledWith(host);
    expect(ttl).toHaveBeenCalledWith(3);
  });

  it("should fail with E_BIND when the local address is not ours", async () => {
    await expectRejectCode(
      resolveTransport(parseDestination(`udp://${host}:9`), { localAddress: FOREIGN_ADDRESS }),
      "E_BIND",
    );
  });

  it("should fail with E_BIND when the multicast interface does not exist", async () => {
    await expectRejectCode(
      resolveTransport(parseDestination("udp://239.2.3.12:6969"), {
        localAddress: UNKNOWN_INTERFACE,
      }),
      "E_BIND",
    );
  });
});

describe("resolveTransport: log", () => {
  it("should write encoded events to the selected stream", async () => {
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    const chunks: Buffer[] = [];
    stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

    const pair = await resolveTransport(parseDestination("log://stderr"), {
      streams: { stdout, stderr },
    });
    expect(pair.reader).toBeUndefined();
    await pair.writer?.write(Buffer.from("<event/>"));
    await new Promise(resolve => setImmediate(resolve));
    expect(Buffer.concat(chunks).toString()).toBe("<event/>");
    expect(stdout.readableLength).toBe(0);

    await pair.close();
    await expectRejectCode(pair.writer?.write(Buffer.from("x")) ?? Promise.resolve(), "E_CHANNEL_IO");
  });
});
