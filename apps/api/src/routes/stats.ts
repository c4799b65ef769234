import { Router } from "express";
import { authMiddleware, currentUser } from "../middleware/auth";
import { computeStats } from "../lib/stats";

export const statsRouter = Router();

statsRouter.get("/", authMiddleware, (req, res) => {
  const { userId } = currentUser(req);
  return res.json(computeStats(userId));
});
