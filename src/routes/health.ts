// src/routes/health.ts
import { Router } from "express";

export function healthRoutes() {
  const r = Router();

  // stateless: the answer never depends on earlier traffic
  r.get("/", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  return r;
}
