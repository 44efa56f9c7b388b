import express, { Request, Response } from "express";
import { getConfig, MAX_BATCH_CANDIDATES } from "./config/env";
import { logger, describeError } from "./config/logger";
import { evaluateRoutes } from "./routes/evaluate";
import { resultRoutes } from "./routes/result";
import { uploadErrorHandler } from "./routes/upload";
import { SUPPORTED_EXTENSIONS } from "./services/document-processor.service";

const app = express();

// Middleware
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/evaluate", evaluateRoutes);
app.use("/result", resultRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
});

// Root route
app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Resume Matcher API",
        version: "1.0.0",
        description: "Scores resumes against a job description and produces interview-ready reports",
        acceptedFiles: SUPPORTED_EXTENSIONS,
        endpoints: {
            "Evaluation": {
                "POST /evaluate": "Evaluate one resume (multipart: resume, jobDescription)",
                "POST /evaluate/batch": `Evaluate up to ${MAX_BATCH_CANDIDATES} resumes (multipart: resumes, jobDescription)`
            },
            "Results": {
                "GET /result/:id": "Get a stored analysis",
                "GET /result/:id/export/:format": "Download as json, csv, pdf (?index=N) or zip",
                "DELETE /result/:id": "Clear a stored analysis"
            },
            "System": {
                "GET /health": "Health check",
                "GET /": "API information"
            }
        }
    });
});

app.use(uploadErrorHandler);

function startServer() {
    try {
        const config = getConfig();

        if (!config.openaiApiKey) {
            logger.warn({}, "OPENAI_API_KEY is not set; evaluations will return default records");
        }

        app.listen(config.port, () => {
            logger.info({
                port: config.port,
                model: config.llmModel,
                maxAttempts: config.evalMaxAttempts,
                batchMaxCandidates: config.batchMaxCandidates
            }, `Server running at http://localhost:${config.port}`);
        });
    } catch (error: unknown) {
        logger.error({ error: describeError(error) }, "Failed to start server");
        process.exit(1);
    }
}

startServer();
