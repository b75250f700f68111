import express from "express";
import type { Express, Request, Response } from "express";
import type { AppContainer } from "./container";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { analyticsRoutes } from "./routes/analytics";
import { employeeRoutes } from "./routes/employees";
import { interviewRoutes } from "./routes/interviews";
import { questionRoutes } from "./routes/questions";
import { recommendationRoutes } from "./routes/recommendations";

export function createApp(container: AppContainer): Express {
    const app = express();

    // Middleware
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/employees", employeeRoutes(container));
    app.use("/interviews", interviewRoutes(container));
    app.use("/questions", questionRoutes(container));
    app.use("/recommendations", recommendationRoutes(container));
    app.use("/analytics", analyticsRoutes(container));

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({
            status: "ok",
            timestamp: new Date().toISOString(),
            database: container.isDatabaseReady() ? "connected" : "disconnected"
        });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "HR Interview Assistant API",
            version: "1.0.0",
            description: "Interview question generation, response analysis and development recommendations",
            endpoints: {
                "Employees": {
                    "POST /employees": "Create an employee",
                    "GET /employees": "List employees (email, skills, department, level, min_level/max_level, manager_id filters)",
                    "GET /employees/:id": "Get an employee",
                    "GET /employees/:id/profile": "Profile snapshot used by the agents",
                    "GET /employees/:id/interviews": "The employee's interviews",
                    "GET /employees/:id/evaluations": "The employee's evaluations",
                    "PATCH /employees/:id": "Update an employee",
                    "DELETE /employees/:id": "Soft delete an employee",
                    "POST /employees/:id/restore": "Restore a soft-deleted employee",
                    "POST /employees/:id/performance-ratings": "Record a performance rating",
                    "POST /employees/:id/resume": "Upload a PDF resume and merge its skills"
                },
                "Interviews": {
                    "POST /interviews": "Schedule an interview",
                    "GET /interviews": "List interviews",
                    "GET /interviews/pending": "Scheduled interviews",
                    "GET /interviews/completed": "Latest completed interviews",
                    "GET /interviews/recent": "Interviews created in the last days",
                    "GET /interviews/calendar": "Interviews scheduled in a date range",
                    "GET /interviews/:id": "Get an interview",
                    "POST /interviews/:id/questions": "Generate interview questions",
                    "POST /interviews/:id/responses": "Submit responses and queue the evaluation",
                    "GET /interviews/:id/evaluation": "Get the evaluation",
                    "POST /interviews/:id/cancel": "Cancel a scheduled interview"
                },
                "Question Bank": {
                    "GET /questions": "Search, sample or filter saved questions",
                    "GET /questions/matching": "Questions targeted at a position, department or level",
                    "POST /questions": "Add a question",
                    "DELETE /questions/:id": "Deactivate a question"
                },
                "Decision Support": {
                    "POST /recommendations": "Recommendations for an analysis result"
                },
                "Analytics": {
                    "GET /analytics/departments/:department/benchmarks": "Department score benchmarks",
                    "GET /analytics/skills/:skill/trends": "Skill mentions over a time window"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            }
        });
    });

    app.use(notFoundHandler);
    app.use(errorHandler(container.logger));

    return app;
}
