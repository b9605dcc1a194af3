import express from "express";
import cors from "cors";
import type { DashboardService } from "./services/dashboard.service.js";

export function createApp(dashboardService: DashboardService) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Dashboard Routes
  app.get("/api/dashboard", async (req, res) => {
    try {
      const dashboard = await dashboardService.getDashboard();
      res.json(dashboard);
    } catch (error) {
      console.error("❌ Failed to build dashboard:", error);
      res.status(500).json({ error: "Failed to fetch dashboard" });
    }
  });

  app.get("/api/dashboard/category-trend", async (req, res) => {
    const { category } = req.query;
    if (typeof category !== "string" || category.trim() === "") {
      res.status(400).json({ error: "category query parameter is required" });
      return;
    }

    try {
      const trend = await dashboardService.getCategoryTrend(category);
      if (!trend) {
        res.status(404).json({ error: "Category not found" });
        return;
      }
      res.json(trend);
    } catch (error) {
      console.error("❌ Failed to build category trend:", error);
      res.status(500).json({ error: "Failed to fetch category trend" });
    }
  });

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "OK", timestamp: new Date().toISOString() });
  });

  return app;
}
