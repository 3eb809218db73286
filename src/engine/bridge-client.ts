// ============================================
// Engine Bridge Client
// ============================================
//
// Talks JSON over HTTP to a bridge service that owns the live engine
// process. Every model operation is a POST to
// `/api/v1/models/:id/<operation>` answered with the envelope
// `{ success, data?, error? }`.
// ============================================

import { z } from "zod";
import { EngineOperationError } from "../core/errors.js";
import { errorMessage, type ApiResponse } from "../types.js";
import type {
  CreateNodeRequest,
  EngineClient,
  EngineSession,
  EntityCategory,
  EvaluateRequest,
  EvaluationResult,
  NodeInfo,
  NodePath,
  PropertyValue,
  Selection,
} from "./types.js";

// ---- Response shapes ----

const envelopeSchema: z.ZodType<ApiResponse> = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

const openedSchema = z.object({ id: z.string().min(1) });
const namesSchema = z.array(z.string());
const parametersSchema = z.record(z.string());
const propertyValueSchema = z.union([z.string(), z.boolean(), z.array(z.string())]);
const propertiesSchema = z.record(propertyValueSchema);
const nodeInfoSchema = z.object({ name: z.string(), type: z.string(), tag: z.string() });
const evaluationSchema = z.object({
  value: z.union([z.number(), z.string(), z.array(z.union([z.number(), z.string()]))]),
  unit: z.string().optional(),
});
const ignoredSchema = z.unknown();

// ---- Transport ----

class BridgeTransport {
  private readonly baseUrl: string;

  constructor(baseUrl: string) {
    // Strip trailing slash for consistent URL building
    this.baseUrl = baseUrl.replace(/\/+$/, "");
  }

  async post<T>(path: string, body: Record<string, unknown>, schema: z.ZodType<T>): Promise<T> {
    const url = `${this.baseUrl}${path}`;

    let res: Response;
    try {
      res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new EngineOperationError(`Engine bridge unreachable at ${url}: ${errorMessage(err)}`, err);
    }

    return this.handleResponse(res, schema);
  }

  private async handleResponse<T>(res: Response, schema: z.ZodType<T>): Promise<T> {
    const text = await res.text();

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new EngineOperationError(
        res.ok ? "Engine bridge returned a non-JSON response" : `HTTP ${res.status}: ${text}`,
      );
    }

    const envelope = envelopeSchema.safeParse(raw);
    if (!envelope.success) {
      throw new EngineOperationError(`Engine bridge returned an unexpected response (HTTP ${res.status})`);
    }
    if (!res.ok || !envelope.data.success) {
      throw new EngineOperationError(envelope.data.error ?? `HTTP ${res.status}`);
    }

    const data = schema.safeParse(envelope.data.data);
    if (!data.success) {
      throw new EngineOperationError(
        `Engine bridge returned malformed data: ${data.error.issues[0]?.message ?? "invalid"}`,
      );
    }
    return data.data;
  }
}

// ---- Session ----

export class BridgeModel implements EngineSession {
  constructor(
    readonly id: string,
    private readonly transport: BridgeTransport,
  ) {}

  async ping(): Promise<void> {
    await this.call("ping", {}, ignoredSchema);
  }

  async name(): Promise<string> {
    return this.call("name", {}, z.string());
  }

  async list(category: EntityCategory): Promise<string[]> {
    return this.call("list", { category }, namesSchema);
  }

  async parameters(): Promise<Record<string, string>> {
    return this.call("parameters", {}, parametersSchema);
  }

  async setParameter(name: string, value: string, description?: string): Promise<void> {
    await this.call("set-parameter", { name, value, description }, ignoredSchema);
  }

  async exists(path: NodePath): Promise<boolean> {
    return this.call("exists", { path }, z.boolean());
  }

  async children(path: NodePath): Promise<NodeInfo[]> {
    return this.call("children", { path }, z.array(nodeInfoSchema));
  }

  async properties(path: NodePath): Promise<Record<string, PropertyValue>> {
    return this.call("properties", { path }, propertiesSchema);
  }

  async setProperty(path: NodePath, name: string, value: PropertyValue): Promise<void> {
    await this.call("set-property", { path, name, value }, ignoredSchema);
  }

  async createNode(parent: NodePath, request: CreateNodeRequest): Promise<NodeInfo> {
    return this.call("create-node", { parent, ...request }, nodeInfoSchema);
  }

  async removeNode(path: NodePath): Promise<void> {
    await this.call("remove-node", { path }, ignoredSchema);
  }

  async select(path: NodePath, selection: Selection): Promise<void> {
    await this.call("select", { path, selection }, ignoredSchema);
  }

  async build(geometry?: string): Promise<void> {
    await this.call("build", { geometry }, ignoredSchema);
  }

  async mesh(mesh?: string): Promise<void> {
    await this.call("mesh", { mesh }, ignoredSchema);
  }

  async solve(study: string): Promise<void> {
    await this.call("solve", { study }, ignoredSchema);
  }

  async evaluate(request: EvaluateRequest): Promise<EvaluationResult> {
    return this.call("evaluate", { ...request }, evaluationSchema);
  }

  async save(path: string): Promise<void> {
    await this.call("save", { path }, ignoredSchema);
  }

  async exportImage(plot: string, path: string): Promise<void> {
    await this.call("export-image", { plot, path }, ignoredSchema);
  }

  async problems(): Promise<string[]> {
    return this.call("problems", {}, namesSchema);
  }

  private call<T>(operation: string, body: Record<string, unknown>, schema: z.ZodType<T>): Promise<T> {
    return this.transport.post(
      `/api/v1/models/${encodeURIComponent(this.id)}/${operation}`,
      body,
      schema,
    );
  }
}

// ---- Client ----

export class EngineBridgeClient implements EngineClient {
  private readonly transport: BridgeTransport;

  constructor(baseUrl: string) {
    this.transport = new BridgeTransport(baseUrl);
  }

  /** Start a fresh, empty model. */
  async createModel(name: string): Promise<BridgeModel> {
    const { id } = await this.transport.post("/api/v1/models", { name }, openedSchema);
    console.log(`[Engine] Created model "${name}" (${id})`);
    return new BridgeModel(id, this.transport);
  }

  /** Open a model file on the bridge host. */
  async loadModel(path: string): Promise<BridgeModel> {
    const { id } = await this.transport.post("/api/v1/models/load", { path }, openedSchema);
    console.log(`[Engine] Loaded model "${path}" (${id})`);
    return new BridgeModel(id, this.transport);
  }
}
