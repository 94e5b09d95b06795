import { Hono } from "hono";
import type { HonoEnv } from "../../types/bindings";
import { SPLITTERS } from "../../services/textSplitter";

const app = new Hono<HonoEnv>();

/**
 * 利用できる分割方式の一覧
 */
app.get("/", (c) => {
  return c.json(SPLITTERS);
});

export default app;
