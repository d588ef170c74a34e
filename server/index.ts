import express, { type NextFunction, type Request, type Response } from "express";
import { buildAssistant } from "./composition";
import { loadConfig } from "./config/env";
import { registerRoutes } from "./routes";
import { handleRouteError } from "./utils/errorHandler";
import { configureLogging, logInfo } from "./utils/requestLogger";

const config = loadConfig();
configureLogging({ level: config.logging.level, dir: config.logging.dir });

const app = express();
app.use(express.json({ limit: "2mb" }));
app.use(express.urlencoded({ extended: false }));

const assistant = buildAssistant(config);
const server = registerRoutes(app, assistant);

// Validation failures and multer errors arrive here via next(err)
app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  handleRouteError(res, err, "Express");
});

server.listen(config.port, () => {
  logInfo(`Server listening on port ${config.port}`, { env: config.nodeEnv });
});
