import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import type { CreateSlidesResponse } from "../../types/slides";
import { requireSession } from "../../middleware/session";
import { splitText } from "../../services/textSplitter";
import { SlideDeckService } from "../../services/slideDeckService";
import { parseCreateSlidesRequest } from "../../utils/validation";
import {
  MalformedRequestError,
  UnauthenticatedError,
} from "../../utils/errors";

const app = new Hono<HonoEnv>();

/**
 * テキストからスライドを作成
 */
app.post("/", requireSession, async (c) => {
  const session = c.get("session");
  if (!session) {
    throw new UnauthenticatedError();
  }

  // 1. リクエストボディの検証
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new MalformedRequestError("Request body must be JSON");
  }
  const input = parseCreateSlidesRequest(body);

  // 2. テキスト分割
  const segments = splitText(input.content, input.splitter);
  if (segments.length === 0) {
    throw new MalformedRequestError("Content produced no slides");
  }

  // 3. プレゼンテーション作成
  const deckService = new SlideDeckService(
    c.env.SLIDES_API(session.accessToken)
  );
  const result = await deckService.build(input.title, segments);

  const response: CreateSlidesResponse = {
    presentation_id: result.presentationId,
    presentation_url: result.presentationUrl,
    message: "Slides created successfully",
  };

  return c.json(response);
});

export default app;
