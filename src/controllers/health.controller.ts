import { Request, Response } from "express";
import { AppDatabase, checkDbConnection } from "../config/databaseConnection";
import { currentVersion } from "../migrations";

export const createHealthController =
  (database: AppDatabase) => (_req: Request, res: Response) => {
    try {
      // verify DB connectivity with a lightweight check
      checkDbConnection(database);

      res.json({
        status: "ok",
        db: "connected",
        schemaVersion: currentVersion(database.sqlite),
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      res.status(500).json({
        status: "error",
        db: "disconnected",
        message: err instanceof Error ? err.message : String(err),
      });
    }
  };
