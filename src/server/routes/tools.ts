import { Router } from "express";
import { ulid } from "ulid";
import { CapabilityCatalog } from "../../core/tool-engine";
import { ToolInvokeSchema } from "./schemas";
import { handle, validateBody } from "../middleware/validation";

/**
 * Lets other nodes use this catalog as a remote tool server.
 */
export function toolsRoutes(catalog: CapabilityCatalog) {
  const r = Router();

  r.get(
    "/",
    handle((req, res) => {
      res.json({ tools: catalog.describeAll() });
    })
  );

  r.post(
    "/invoke",
    validateBody(ToolInvokeSchema, async (body, req, res) => {
      const outcome = await catalog.dispatch({
        id: body.invocationId ?? ulid(),
        capabilityName: body.name,
        arguments: body.arguments,
      });
      if (outcome.success) {
        res.json({ ok: true, result: outcome.result, elapsedMs: outcome.elapsedMs });
      } else {
        res.json({ ok: false, error: { code: outcome.error.code, message: outcome.error.message } });
      }
    })
  );

  return r;
}
