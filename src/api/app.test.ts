import { NextFunction, Request, Response } from "express";
import { handleUncaughtError } from "./app";
import { startTestServer, TestServer } from "./testing/testServer";

const createMockResponse = (headersSent = false) => {
  const res = {
    headersSent,
    status: jest.fn(),
    json: jest.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
};

describe("handleUncaughtError", () => {
  const req = {} as Request;

  beforeEach(() => {
    jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("answers 400 for a malformed JSON body", () => {
    const res = createMockResponse();
    const next: NextFunction = jest.fn();

    handleUncaughtError(new SyntaxError("Unexpected token"), req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({ error: "Malformed JSON body" });
  });

  it("keeps the status of a body parser client error", () => {
    const res = createMockResponse();
    const next: NextFunction = jest.fn();
    const tooLarge = Object.assign(new Error("request entity too large"), { status: 413 });

    handleUncaughtError(tooLarge, req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(413);
    expect(res.json).toHaveBeenCalledWith({ error: "request entity too large" });
    expect(console.error).not.toHaveBeenCalled();
  });

  it("does not pass a 5xx status through", () => {
    const res = createMockResponse();
    const next: NextFunction = jest.fn();
    const failure = Object.assign(new Error("upstream broke"), { status: 503 });

    handleUncaughtError(failure, req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: "Internal server error" });
  });

  it("logs anything else and answers 500", () => {
    const res = createMockResponse();
    const next: NextFunction = jest.fn();
    const boom = new Error("boom");

    handleUncaughtError(boom, req, res as unknown as Response, next);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: "Internal server error" });
    expect(console.error).toHaveBeenCalledWith("Unhandled error:", boom);
  });

  it("hands off to Express when the response has started", () => {
    const res = createMockResponse(true);
    const next = jest.fn();
    const boom = new Error("boom");

    handleUncaughtError(boom, req, res as unknown as Response, next);

    expect(next).toHaveBeenCalledWith(boom);
    expect(res.status).not.toHaveBeenCalled();
  });
});

describe("createApp", () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await startTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  it("reports health", async () => {
    const res = await server.request("GET", "/health");

    expect(res.status).toBe(200);
    expect(res.body).toHaveProperty("status", "ok");
  });

  it("answers 404 for an unknown route", async () => {
    const res = await server.request("GET", "/lunch-menu");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not found" });
  });

  it("answers 400 for a malformed JSON body", async () => {
    const res = await server.request("POST", "/announcements?teacher_username=mrivera", {
      body: "{ not json",
      headers: { "content-type": "application/json" },
    });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Malformed JSON body" });
  });

  it("answers 413 for a body over the size limit", async () => {
    const res = await server.request("POST", "/announcements?teacher_username=mrivera", {
      json: { message: "x".repeat(200_000), end_date: "2026-10-31" },
    });

    expect(res.status).toBe(413);
    expect(res.body).toEqual({ error: "request entity too large" });
  });

  it("answers 415 for a charset the JSON parser does not take", async () => {
    const res = await server.request("POST", "/announcements?teacher_username=mrivera", {
      body: JSON.stringify({ message: "Book fair", end_date: "2026-10-31" }),
      headers: { "content-type": "application/json; charset=latin-9" },
    });

    expect(res.status).toBe(415);
    expect(res.body).toEqual({ error: 'unsupported charset "LATIN-9"' });
  });
});
