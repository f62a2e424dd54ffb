import type { Duplex } from "node:stream";
import type {
  BitDepth,
  Color,
  LinkFault,
  LinkSnapshot,
  ShapeColorPriority,
} from "../types/protocol.js";
import { DEFAULT_DEPTH, convertDepth, createColor } from "../color/color.js";
import { buildInitProfileCommand, buildMeasurementCommand } from "./commands.js";
import { parseResponse } from "./response-parser.js";
import { createLinkChannel } from "./channel.js";
import { connectToRemote, formatRemoteAddress, type RemoteAddress } from "./connection.js";
import { createSharedState } from "./shared-state.js";
import { describeError, isProtocolViolation } from "./errors.js";
import type { XmlMessageLog } from "./xml-log.js";

const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_SEND_INTERVAL_MS = 1_000;
const DEFAULT_RETRY_DELAY_MS = 50;

export interface LinkLogger {
  readonly info: (msg: string) => void;
  readonly warn: (msg: string) => void;
  readonly error: (msg: string) => void;
}

export interface LinkWorkerOptions {
  readonly connectTimeoutMs?: number;
  readonly sendIntervalMs?: number;
  readonly retryDelayMs?: number;
  /** Depth the requested color is converted to before it goes on the wire */
  readonly requestDepthBits?: BitDepth;
  /** Color carried by the first measurement request */
  readonly initialColor?: Color;
  readonly shapeColorPriority?: ShapeColorPriority;
  readonly logger?: LinkLogger;
  readonly xmlLog?: XmlMessageLog;
  readonly connect?: (address: RemoteAddress, timeoutMs: number) => Promise<Duplex>;
  readonly onStateChange?: (snapshot: LinkSnapshot) => void;
  readonly onFault?: (fault: LinkFault) => void;
}

export interface LinkHandle {
  readonly remote: string;
  readonly read: () => LinkSnapshot;
  /** Throws InvalidColor when a channel is outside the color's depth */
  readonly setRequestedColor: (color: Color) => void;
  /** Stops both loops and destroys the socket */
  readonly close: () => Promise<void>;
  /** Resolves once both loops have ended */
  readonly done: Promise<void>;
}

function defaultConnect(address: RemoteAddress, timeoutMs: number): Promise<Duplex> {
  return connectToRemote(address, { timeoutMs });
}

/**
 * Connects to the instrument and starts the receiver and sender loops.
 * Rejects with the connect error when the first connection fails; there is
 * no reconnect, the receiver keeps retrying reads on the same socket.
 */
export async function spawnLinkWorker(
  address: RemoteAddress,
  options: LinkWorkerOptions = {},
): Promise<LinkHandle> {
  const log = options.logger;
  const remote = formatRemoteAddress(address);
  const sendIntervalMs = options.sendIntervalMs ?? DEFAULT_SEND_INTERVAL_MS;
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const requestDepth = options.requestDepthBits ?? DEFAULT_DEPTH;
  const connect = options.connect ?? defaultConnect;
  const initialColor = options.initialColor
    ? createColor(
        options.initialColor.red,
        options.initialColor.green,
        options.initialColor.blue,
        options.initialColor.depthBits,
      )
    : null;

  const socket = await connect(address, options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);
  log?.info(`Connected to ColourSpace at ${remote}`);

  const channel = createLinkChannel(socket);
  const state = createSharedState({
    shapeColorPriority: options.shapeColorPriority,
    onChange: options.onStateChange,
  });

  if (initialColor !== null) {
    state.setRequestedColor(initialColor);
  }

  const pendingWaits = new Set<() => void>();
  let stopped = false;
  let outageLogged = false;
  let lastSent: Color | null = null;

  function pause(ms: number): Promise<void> {
    if (stopped) return Promise.resolve();

    return new Promise((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        pendingWaits.delete(finish);
        resolve();
      };
      const timer = setTimeout(finish, ms);
      pendingWaits.add(finish);
    });
  }

  function stop(): void {
    if (stopped) return;
    stopped = true;
    for (const finish of [...pendingWaits]) {
      finish();
    }
    channel.close();
  }

  function requestAtWireDepth(): Color {
    return convertDepth(state.read().requestedColor, requestDepth);
  }

  function handleOutage(reason: string): void {
    state.markDisconnected(reason);
    if (!outageLogged) {
      outageLogged = true;
      log?.warn(`ColourSpace link interrupted: ${reason}; retrying every ${retryDelayMs}ms`);
    }
  }

  function handleFault(err: unknown): void {
    if (!isProtocolViolation(err)) return;
    const fault: LinkFault = { code: err.code, message: err.message, at: Date.now() };
    log?.error(`Protocol violation from ${remote} (${fault.code}): ${fault.message}; worker stopped`);
    state.recordFault(fault);
    stop();
    options.onFault?.(fault);
  }

  async function runReceiver(): Promise<void> {
    try {
      await channel.send(buildInitProfileCommand());
    } catch (err: unknown) {
      log?.warn(`init profile handshake failed: ${describeError(err)}`);
    }

    while (!stopped) {
      let payload: string | null;

      try {
        payload = await channel.receive();
      } catch (err: unknown) {
        if (stopped) return;
        if (isProtocolViolation(err)) {
          handleFault(err);
          return;
        }
        handleOutage(describeError(err));
        await pause(retryDelayMs);
        continue;
      }

      if (stopped) return;

      if (payload === null) {
        handleOutage("remote signalled end of communication");
        await pause(retryDelayMs);
        continue;
      }

      // Appends stay ordered inside the log; the receiver does not wait on disk
      options.xmlLog?.record(payload).catch((err: unknown) => {
        log?.warn(`XML log write failed: ${describeError(err)}`);
      });

      try {
        const result = parseResponse(payload, lastSent ?? requestAtWireDepth());
        state.applyMeasurement(result);
      } catch (err: unknown) {
        if (!isProtocolViolation(err)) throw err;
        handleFault(err);
        return;
      }

      if (outageLogged) {
        outageLogged = false;
        log?.info(`ColourSpace link to ${remote} resumed`);
      }
    }
  }

  async function runSender(): Promise<void> {
    while (!stopped) {
      const color = requestAtWireDepth();

      try {
        await channel.send(buildMeasurementCommand(color));
        lastSent = color;
      } catch (err: unknown) {
        if (stopped) return;
        const reason = describeError(err);
        state.markDisconnected(reason);
        log?.error(`Measurement send failed: ${reason}; sender stopped`);
        return;
      }

      if (stopped) return;
      await pause(sendIntervalMs);
    }
  }

  // Writes are queued in call order, so the handshake goes out before the
  // sender's first measurement
  const receiver = runReceiver();
  const sender = runSender();

  const done = Promise.all([receiver, sender]).then(() => undefined);
  done.catch((err: unknown) => {
    log?.error(`ColourSpace worker crashed: ${describeError(err)}`);
    stop();
  });

  return {
    remote,

    read(): LinkSnapshot {
      return state.read();
    },

    setRequestedColor(color: Color): void {
      state.setRequestedColor(createColor(color.red, color.green, color.blue, color.depthBits));
    },

    async close(): Promise<void> {
      stop();
      await done.catch(() => undefined);
    },

    done,
  };
}
