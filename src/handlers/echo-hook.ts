import { responseWriterFromContext } from "../bot/context";
import { newWebHookHandler, type WebHookHandler } from "../bot/handler";
import { PayloadTooLargeError, readBody, writeJson } from "../utils/http";

/** POST a body to `<hook url>?channel=<name>` to have the bot say it there. */
export function newEchoHook(): WebHookHandler {
  return newWebHookHandler("echo", "relays a posted body to a channel", async (ctx, req, res) => {
    if (req.method !== "POST") {
      res.setHeader("allow", "POST");
      writeJson(res, 405, { error: "method_not_allowed" });
      return;
    }
    const channel = new URL(req.url ?? "/", "http://localhost").searchParams.get("channel");
    if (!channel) {
      writeJson(res, 400, { error: "missing_channel" });
      return;
    }
    const w = responseWriterFromContext(ctx);
    if (!w) {
      writeJson(res, 503, { error: "no_adapter" });
      return;
    }

    let body: string;
    try {
      body = await readBody(req);
    } catch (error) {
      if (error instanceof PayloadTooLargeError) {
        writeJson(res, 413, { error: "payload_too_large" });
        return;
      }
      throw error;
    }
    const text = body.trim();
    if (!text) {
      writeJson(res, 400, { error: "empty_body" });
      return;
    }

    w.setChannel(channel);
    await w.write(text);
    writeJson(res, 202, { ok: true });
  });
}
