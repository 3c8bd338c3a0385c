import express from "express";
import cors from "cors";
import { isDateKey } from "./collectors/window";
import { errorMessage } from "./common/errors";
import { CheckpointStore } from "./storage/CheckpointStore";
import { directOnly } from "./delivery/DeliveryService";

/** Read-only JSON API over the checkpoints written by the collect run. */
export function createServer(store: CheckpointStore) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", store: store.name });
  });

  app.get("/api/checkpoints/:dateKey", async (req, res) => {
    const { dateKey } = req.params;
    if (!isDateKey(dateKey)) {
      res.status(400).json({ error: `Invalid date key "${dateKey}", expected YYYY-MM-DD` });
      return;
    }

    try {
      const record = await store.read(dateKey);
      if (!record) {
        res.status(404).json({ error: `No checkpoint for ${dateKey}. Run the collect phase first.` });
        return;
      }
      const messages = req.query.relevance === "direct" ? directOnly(record.messages) : record.messages;
      res.json({ ...record, messages });
    } catch (error) {
      console.error("[server] Failed to read checkpoint:", errorMessage(error));
      res.status(500).json({ error: "Failed to read checkpoint" });
    }
  });

  return app;
}
