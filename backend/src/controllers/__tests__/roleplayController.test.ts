// backend/src/controllers/__tests__/roleplayController.test.ts

import { describe, it, expect, vi, beforeEach, afterEach, afterAll } from "vitest";
import type { Request, Response } from "express";
import type { GenerationRequest } from "../../ai/textGenerator";
import { testCatalog } from "../../services/__tests__/fixtures";
import { createRoleplayService } from "../../services/roleplayService";
import { GenerationUnavailableError, TransientGenerationError } from "../../utils/errors";
import { createRoleplayController } from "../roleplayController";

function makeRes() {
  const res: any = { locals: {} };
  res.status = vi.fn(() => res);
  res.json = vi.fn(() => res);
  return res;
}

function makeReq(body: unknown) {
  return { body } as unknown as Request;
}

function payload(res: Response) {
  return (res.json as any).mock.calls[0][0];
}

describe("roleplayController", () => {
  const original = process.env.MAX_TURN_CHARS;
  const generate = vi.fn(async (_request: GenerationRequest) => "我家有五口人。(Wǒ jiā yǒu wǔ kǒu rén.)");
  const controller = createRoleplayController(
    createRoleplayService({ catalog: testCatalog(), generator: { generate }, random: () => 0 })
  );

  const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

  beforeEach(() => {
    generate.mockClear();
    errorSpy.mockClear();
  });

  afterAll(() => {
    errorSpy.mockRestore();
  });

  afterEach(() => {
    if (original === undefined) delete process.env.MAX_TURN_CHARS;
    else process.env.MAX_TURN_CHARS = original;
  });

  it("start returns the opening for a unit", () => {
    const res = makeRes();
    controller.start(makeReq({ unitId: "unit3" }), res);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(payload(res)).toEqual({
      unitId: "unit3",
      greeting: "你好！(Nǐ hǎo!)",
      firstQuestion: "你今天几点起床？",
      opening: "你好！(Nǐ hǎo!)\n你今天几点起床？",
    });
  });

  it("start validates unitId", () => {
    const res = makeRes();
    controller.start(makeReq(undefined), res);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(payload(res)).toEqual({ error: "unitId is required", code: "INVALID_REQUEST" });
  });

  it("maps an unknown unit to 404", () => {
    const res = makeRes();
    controller.start(makeReq({ unitId: "unit9" }), res);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(payload(res)).toEqual({ error: "Unknown unitId: unit9", code: "NOT_FOUND" });
  });

  it("directive returns the directive and skipped count", () => {
    const res = makeRes();
    controller.directive(
      makeReq({ unitId: "unit2", history: [{ role: "student", text: "我没有宠物" }, { role: "x" }] }),
      res
    );

    expect(res.status).toHaveBeenCalledWith(200);
    expect(payload(res).skippedTurns).toBe(1);
    expect(payload(res).directive.prohibited).toEqual(["pet"]);
  });

  it("turn replies with the directive", async () => {
    const res = makeRes();
    await controller.turn(makeReq({ unitId: "unit2", message: "你家有几口人？", history: [] }), res);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(payload(res).reply).toBe("我家有五口人。(Wǒ jiā yǒu wǔ kǒu rén.)");
    expect(payload(res).directive.covered).toEqual([1]);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it("turn requires a message", async () => {
    const res = makeRes();
    await controller.turn(makeReq({ unitId: "unit2", message: "   " }), res);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(payload(res)).toEqual({ error: "message is required", code: "INVALID_REQUEST" });
  });

  it("turn rejects overlong messages", async () => {
    process.env.MAX_TURN_CHARS = "5";
    const res = makeRes();
    await controller.turn(makeReq({ unitId: "unit2", message: "你家有几口人？" }), res);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(payload(res)).toEqual({ error: "Message too long (max 5 characters)", code: "MESSAGE_TOO_LONG" });
    expect(generate).not.toHaveBeenCalled();
  });

  it("maps a failed generation to 502", async () => {
    generate.mockRejectedValueOnce(new TransientGenerationError("Text generation failed", new Error("timeout")));
    const res = makeRes();
    await controller.turn(makeReq({ unitId: "unit2", message: "你好" }), res);

    expect(res.status).toHaveBeenCalledWith(502);
    expect(payload(res)).toEqual({ error: "Text generation failed", code: "GENERATION_FAILED" });
  });

  it("maps a missing API key to 503", async () => {
    generate.mockRejectedValueOnce(new GenerationUnavailableError());
    const res = makeRes();
    await controller.translate(makeReq({ text: "你好" }), res);

    expect(res.status).toHaveBeenCalledWith(503);
    expect(payload(res)).toEqual({ error: "OPENAI_API_KEY is not set", code: "AI_NOT_CONFIGURED" });
  });

  it("hides unexpected errors behind a 500", async () => {
    generate.mockRejectedValueOnce(new Error("boom"));
    const res = makeRes();
    res.locals.requestId = "req-1";
    await controller.feedback(makeReq({ unitId: "unit2", history: [] }), res);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(payload(res)).toEqual({ error: "Server error", code: "SERVER_ERROR", requestId: "req-1" });
    expect(errorSpy).toHaveBeenCalledWith("[roleplay.feedback] requestId=req-1 Error boom");
  });

  it("translate requires text", async () => {
    const res = makeRes();
    await controller.translate(makeReq({ text: 42 }), res);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(payload(res)).toEqual({ error: "text is required", code: "INVALID_REQUEST" });
  });

  it("feedback returns the generated text", async () => {
    generate.mockResolvedValueOnce("Well done!");
    const res = makeRes();
    await controller.feedback(makeReq({ unitId: "unit2", history: [{ role: "student", text: "你好" }] }), res);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(payload(res)).toEqual({ feedback: "Well done!" });
  });
});
