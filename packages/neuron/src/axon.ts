/**
 * Axon: the neuron's HTTP endpoint.
 *
 *   GET  /          health
 *   POST /forward   one synapse forward call
 *   POST /backward  remote gradients for the dispatcher
 *
 * The caller identifies itself with the `x-hotkey` header. Admission runs
 * before any compute.
 */
import { Hono } from "hono";
import { serve } from "@hono/node-server";
import type { TensorData } from "@tensorpeer/core";
import { errorMessage } from "@tensorpeer/core";
import { noGradCtx } from "@tensorpeer/autograd";
import {
  BackwardRequestSchema,
  ForwardRequestSchema,
  callFromWireRequest,
  decodeTensor,
  failureResponse,
  type BackwardResponse,
  type ForwardCall,
} from "@tensorpeer/synapse";
import { silentLog, type Log } from "@tensorpeer/effect-runtime";
import type { AdmissionController } from "./admission.js";
import type { CallbackMap, SynapseRef } from "./callbacks.js";
import type { BackwardDispatcher } from "./dispatcher.js";
import type { ModelState } from "./state.js";

export const HOTKEY_HEADER = "x-hotkey";

export interface AxonDeps {
  hotkey: string;
  admission: AdmissionController;
  callbacks: CallbackMap;
  dispatcher: BackwardDispatcher;
  state: ModelState;
  log?: Log;
  now?: () => number;
}

async function readJson(req: Request): Promise<{ ok: true; body: unknown } | { ok: false; error: string }> {
  try {
    return { ok: true, body: await req.json() };
  } catch (e) {
    return { ok: false, error: `body is not JSON: ${errorMessage(e)}` };
  }
}

function backwardFailure(code: BackwardResponse["code"], message: string): BackwardResponse {
  return { code, message, results: [] };
}

export function createAxonApp(deps: AxonDeps): Hono {
  const { admission, callbacks, dispatcher, state } = deps;
  const log = deps.log ?? silentLog;
  const now = deps.now ?? Date.now;
  const app = new Hono();

  app.get("/", (c) =>
    c.json({ status: "ok", hotkey: deps.hotkey, synapses: [...callbacks.keys()] }),
  );

  app.post("/forward", async (c) => {
    const caller = c.req.header(HOTKEY_HEADER) ?? "";
    const raw = await readJson(c.req.raw);
    if (!raw.ok) return c.json(failureResponse("RequestDeserializationException", raw.error), 400);
    const parsed = ForwardRequestSchema.safeParse(raw.body);
    if (!parsed.success) return c.json(failureResponse("InvalidRequest", parsed.error.message), 400);
    const req = parsed.data;

    const decision = admission.evaluate(caller, req.synapse);
    if (decision._tag === "Reject") {
      log.debug("blacklisted", { caller, synapse: req.synapse, policy: decision.policy });
      return c.json(failureResponse("Blacklisted", decision.reason), 403);
    }

    const callback = callbacks.get(req.synapse);
    if (!callback) return c.json(failureResponse("NotImplemented", "Not Implemented"), 501);

    let call: ForwardCall;
    try {
      call = callFromWireRequest(req);
    } catch (e) {
      return c.json(failureResponse("RequestDeserializationException", errorMessage(e)), 400);
    }

    const started = now();
    let output: TensorData;
    try {
      output = await state.exclusive((guard) => callback(noGradCtx(guard.backend), call.input, call).data);
    } catch (e) {
      log.warn("forward failed", { caller, synapse: req.synapse, error: errorMessage(e) });
      return c.json(failureResponse("UnknownException", errorMessage(e)), 500);
    }
    const elapsedMs = now() - started;
    if (elapsedMs > call.timeout * 1000) {
      return c.json(failureResponse("Timeout", `took ${elapsedMs}ms, timeout is ${call.timeout}s`), 504);
    }

    try {
      call.setOutput(output);
    } catch (e) {
      return c.json(failureResponse("ResponseSerializationException", errorMessage(e)), 500);
    }
    const response = call.toWireResponse();
    return c.json(response, response.code === "Success" ? 200 : 500);
  });

  app.post("/backward", async (c) => {
    const caller = c.req.header(HOTKEY_HEADER) ?? "";
    const raw = await readJson(c.req.raw);
    if (!raw.ok) return c.json(backwardFailure("RequestDeserializationException", raw.error), 400);
    const parsed = BackwardRequestSchema.safeParse(raw.body);
    if (!parsed.success) return c.json(backwardFailure("InvalidRequest", parsed.error.message), 400);
    const { serializer, items } = parsed.data;

    const decision = admission.evaluate(caller, "backward");
    if (decision._tag === "Reject") {
      return c.json(backwardFailure("Blacklisted", decision.reason), 403);
    }

    const inputs: TensorData[] = [];
    const grads: TensorData[] = [];
    const synapses: SynapseRef[] = [];
    try {
      for (const item of items) {
        inputs.push(decodeTensor(serializer, item.input));
        grads.push(decodeTensor(serializer, item.grad));
        synapses.push({ kind: item.synapse });
      }
    } catch (e) {
      return c.json(backwardFailure("RequestDeserializationException", errorMessage(e)), 400);
    }

    const results = await dispatcher.dispatch(inputs, grads, synapses);
    const body: BackwardResponse = { code: "Success", message: "Success", results };
    return c.json(body);
  });

  return app;
}

// ── Server ─────────────────────────────────────────────────────────────────

export interface AxonServer {
  readonly port: number;
  close(): Promise<void>;
}

/** Serve `app` on Node's HTTP server. */
export function startAxon(app: Hono, host: string, port: number, log: Log = silentLog): AxonServer {
  const server = serve({ fetch: app.fetch, hostname: host, port }, (info) => {
    log.info("axon listening", { host, port: info.port });
  });
  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
