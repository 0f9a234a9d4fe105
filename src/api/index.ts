import "dotenv/config";
import express from "express";
import cors from "cors";

import { loadConfig } from "../config";
import { createTutorDependencies } from "../services/tutorFactory";
import { createTutorRouter } from "./routes/tutor";

// Fails fast on missing settings
const config = loadConfig();

const app = express();

// Middleware
app.use(cors({
  origin: ["http://localhost:5173", "http://localhost:3000"],
  credentials: true,
}));
// Pitch uploads arrive base64-encoded in the JSON body
app.use(express.json({ limit: "30mb" }));

// Routes
app.use("/api/tutor", createTutorRouter(createTutorDependencies(config)));

// Health check
app.get("/api/health", (req, res) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Start server
app.listen(config.apiPort, () => {
  console.log(`API server running on http://localhost:${config.apiPort}`);
});

export default app;
