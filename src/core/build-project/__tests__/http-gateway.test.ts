/**
 * HTTP gateway tests against a stubbed fetch
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { ProxyAgent } from "undici";
import { HttpBuildProjectGateway } from "../impl/HttpBuildProjectGateway.js";
import { ErrorCode, GatewayError } from "../../errors.js";

const HOST = "https://build.example.com";
const API = `${HOST}/api/v2/aihub/build/projects`;

function respondWith(body: unknown, status = 200) {
  return vi.fn<typeof fetch>(
    async () => new Response(body === undefined ? "" : JSON.stringify(body), { status })
  );
}

function requestOf(fetchMock: ReturnType<typeof respondWith>, call = 0) {
  const [url, init] = fetchMock.mock.calls[call] ?? [];
  return { url, method: init?.method, headers: init?.headers, body: init?.body };
}

describe("HttpBuildProjectGateway", () => {
  it("fetches the schema with bearer auth", async () => {
    const fetchMock = respondWith({ "5": { name: "Invoice", fields: {} }, last_edited_at: "2024-03-01" });
    const gateway = new HttpBuildProjectGateway({ hostUrl: `${HOST}/`, token: "test-token", fetch: fetchMock });

    const schema = await gateway.fetchSchema("proj-1");

    expect(schema).toEqual({ "5": { name: "Invoice", fields: {} }, last_edited_at: "2024-03-01" });
    expect(requestOf(fetchMock)).toEqual({
      url: `${API}/proj-1/schema`,
      method: "GET",
      headers: { Authorization: "Bearer test-token" },
      body: undefined,
    });
  });

  it("posts validations as JSON", async () => {
    const fetchMock = respondWith({ id: 1000 });
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });
    const payload = {
      projectId: "proj-1",
      name: "Check Total",
      type: "FIELD_CONFIDENCE",
      affected_fields: [7],
      alert_level: "WARNING",
      scope: "FIELD",
      description: "",
      input_fields: [],
      params: {},
    };

    expect(await gateway.postValidation("proj-1", payload)).toEqual({ id: 1000 });
    const request = requestOf(fetchMock);
    expect(request.url).toBe(`${API}/proj-1/validations`);
    expect(request.method).toBe("POST");
    expect(request.headers).toEqual({ Authorization: "Bearer test-token", "Content-Type": "application/json" });
    expect(request.body).toBe(JSON.stringify(payload));
  });

  it("sends requests through the configured proxy", async () => {
    const fetchMock = respondWith(undefined);
    const gateway = new HttpBuildProjectGateway({
      hostUrl: HOST,
      token: "test-token",
      fetch: fetchMock,
      proxy: { host: "proxy.internal", port: "3128", user: "test-user", password: "test-password" },
    });

    await gateway.triggerExamples("proj-1", 601);

    expect(fetchMock.mock.calls[0]?.[1]?.dispatcher).toBeInstanceOf(ProxyAgent);
  });

  it("connects directly without a proxy", async () => {
    const fetchMock = respondWith(undefined);
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });

    await gateway.triggerExamples("proj-1", 601);

    expect(fetchMock.mock.calls[0]?.[1]?.dispatcher).toBeUndefined();
  });

  it("deletes a rule by query parameter", async () => {
    const fetchMock = respondWith(undefined);
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });

    await gateway.deleteValidation("proj-1", 9);

    expect(requestOf(fetchMock)).toMatchObject({ url: `${API}/proj-1/validations?id=9`, method: "DELETE" });
  });

  it("triggers example and code generation", async () => {
    const fetchMock = respondWith(undefined);
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });

    await gateway.triggerExamples("proj-1", 601);
    await gateway.triggerCodeGeneration("proj-1", 1001);

    expect(requestOf(fetchMock, 0)).toMatchObject({ url: `${API}/proj-1/validations/601/examples`, method: "PUT" });
    expect(requestOf(fetchMock, 1)).toMatchObject({
      url: `${API}/proj-1/validations/1001/code-generation`,
      method: "PUT",
    });
  });

  it("reads and updates project settings", async () => {
    const fetchMock = respondWith({ projects: [{ id: "proj-1", name: "Invoices" }] });
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });

    expect(await gateway.fetchSettings("proj-1")).toEqual({ projects: [{ id: "proj-1", name: "Invoices" }] });
    await gateway.updateSettings("proj-1", { llm: "default" });

    expect(requestOf(fetchMock, 0).url).toBe(`${API}?proj_id=proj-1&query_option=uuid`);
    expect(requestOf(fetchMock, 1)).toMatchObject({
      url: `${API}?project_id=proj-1`,
      method: "PATCH",
      body: JSON.stringify({ llm: "default" }),
    });
  });

  it("creates projects in the org context", async () => {
    const fetchMock = respondWith({ project_id: "new-target" });
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });

    const created = await gateway.createProject({ name: "Invoices", org: "acme", workspace: "prod" });

    expect(created).toEqual({ project_id: "new-target" });
    const request = requestOf(fetchMock);
    expect(request.url).toBe(API);
    expect(request.headers).toEqual({
      Authorization: "Bearer test-token",
      "Ib-Context": "acme",
      "Content-Type": "application/json",
    });
    expect(typeof request.body === "string" ? JSON.parse(request.body) : undefined).toMatchObject({
      name: "Invoices",
      desc: "Invoices",
      org: "acme",
      workspace: "prod",
      creation_base: "NONE",
    });
  });

  it("raises a GatewayError on a non-2xx status", async () => {
    const fetchMock = respondWith({ message: "boom" }, 500);
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });

    const error = await gateway.fetchUdfs("proj-1").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GatewayError);
    expect(error).toMatchObject({
      code: ErrorCode.GATEWAY_REQUEST_FAILED,
      status: 500,
      method: "GET",
      path: "/api/v2/aihub/build/projects/proj-1/udfs",
    });
  });

  it("rejects a response of the wrong shape", async () => {
    const fetchMock = respondWith({ udf: 5 });
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", fetch: fetchMock });

    await expect(gateway.createUdf("proj-1", { name: "a" })).rejects.toMatchObject({
      code: ErrorCode.GATEWAY_INVALID_RESPONSE,
    });
  });

  it("times out a request that does not answer", async () => {
    const fetchMock = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const aborted = new Error("This operation was aborted");
            aborted.name = "AbortError";
            reject(aborted);
          });
        })
    );
    const gateway = new HttpBuildProjectGateway({ hostUrl: HOST, token: "test-token", timeoutMs: 10, fetch: fetchMock });

    await expect(gateway.fetchValidations("proj-1")).rejects.toMatchObject({ code: ErrorCode.GATEWAY_TIMEOUT });
  });

  describe("client certificate", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "build-migrate-cert-"));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("sends the trimmed certificate base64-encoded", async () => {
      const certificatePath = path.join(dir, "client.pem");
      await fs.writeFile(certificatePath, "  test-certificate\n");
      const fetchMock = respondWith({ rules: [] });
      const gateway = new HttpBuildProjectGateway({
        hostUrl: HOST,
        token: "test-token",
        certificatePath,
        fetch: fetchMock,
      });

      await gateway.fetchValidations("proj-1");

      expect(requestOf(fetchMock).headers).toEqual({
        Authorization: "Bearer test-token",
        "IB-Certificate": Buffer.from("test-certificate").toString("base64"),
      });
    });

    it("continues without the header when the file is missing", async () => {
      const fetchMock = respondWith({ rules: [] });
      const gateway = new HttpBuildProjectGateway({
        hostUrl: HOST,
        token: "test-token",
        certificatePath: path.join(dir, "missing.pem"),
        fetch: fetchMock,
      });

      await gateway.fetchValidations("proj-1");

      expect(requestOf(fetchMock).headers).toEqual({ Authorization: "Bearer test-token" });
    });
  });
});
