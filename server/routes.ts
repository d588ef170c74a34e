import type { Express, Request, Response } from "express";
import { createServer, type Server } from "http";
import multer from "multer";
import { z } from "zod";
import {
  classifyRequestSchema,
  inboundMessageSchema,
  leadRequestSchema,
  proposalRequestSchema,
  scheduleRequestSchema,
  statusRequestSchema,
  type InboundMessage,
} from "@shared/schema";
import { UNKNOWN, type ParsedLead } from "./agents/dealflow/types";
import type { Assistant } from "./composition";
import type { Message } from "./dispatcher/types";
import { commonSchemas, uploadFieldsSchema, validate } from "./middleware/validation";
import { extractTextFromFile } from "./textExtractor";
import { ValidationError, handleRouteError } from "./utils/errorHandler";
import { generateRequestId } from "./utils/requestLogger";

// Configure multer for file uploads (store in memory)
const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: 10 * 1024 * 1024 },
});

export function toMessage(body: InboundMessage): Message {
  return {
    text: body.text,
    userId: body.userId,
    requestId: body.requestId ?? generateRequestId(),
    hasAttachment: body.hasAttachment || body.attachment !== undefined,
    attachment: body.attachment,
  };
}

/**
 * Builds a lead from explicit proposal fields. Returns null when none were
 * given so the generic proposal is used.
 */
function leadFromProposalRequest(assistant: Assistant, body: z.infer<typeof proposalRequestSchema>) {
  const provided = Object.values(body).some(value => typeof value === "string" && value.trim() !== "");
  if (!provided) return null;
  const parsed: ParsedLead = {
    name: body.name ?? UNKNOWN,
    company: body.company ?? UNKNOWN,
    email: UNKNOWN,
    phone: UNKNOWN,
    intent: body.intent ?? UNKNOWN,
    budget: body.budget ?? UNKNOWN,
    timeline: body.timeline ?? UNKNOWN,
    notes: "",
  };
  return assistant.dealflow.enrichLead(parsed);
}

export function registerRoutes(app: Express, assistant: Assistant): Server {
  const { handler, classifier, contextStore, dealflow } = assistant;

  // Conversational entry point
  app.post("/api/messages", validate({ body: inboundMessageSchema }), async (req: Request, res: Response) => {
    try {
      const body: InboundMessage = req.body;
      const response = await handler.handle(toMessage(body));
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, "Messages");
    }
  });

  // Document upload: extract text, then handle as an attachment message
  app.post("/api/messages/upload", upload.single("file"), async (req: Request, res: Response) => {
    try {
      if (!req.file) {
        throw new ValidationError("No file uploaded");
      }
      const fields = uploadFieldsSchema.parse(req.body);
      const text = await extractTextFromFile(req.file.buffer, req.file.originalname);

      const response = await handler.handle({
        text: fields.text,
        userId: fields.userId,
        requestId: fields.requestId ?? generateRequestId(),
        hasAttachment: true,
        attachment: { filename: req.file.originalname, text },
      });
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, "Upload");
    }
  });

  app.post(
    "/api/messages/:requestId/cancel",
    validate({ params: commonSchemas.requestId }),
    (req: Request, res: Response) => {
      const requestId = req.params.requestId;
      const cancelled = handler.cancel(requestId);
      res.status(cancelled ? 200 : 409).json({ requestId, cancelled });
    },
  );

  // Classification only, no dispatch
  app.post("/api/classify", validate({ body: classifyRequestSchema }), async (req: Request, res: Response) => {
    try {
      const body: z.infer<typeof classifyRequestSchema> = req.body;
      const previousIntent = body.userId ? contextStore.previousIntent(body.userId) : undefined;
      const result = await classifier.classify(body.text, { hasAttachment: body.hasAttachment, previousIntent });
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Classify");
    }
  });

  app.post("/api/classify/quick", validate({ body: classifyRequestSchema }), (req: Request, res: Response) => {
    try {
      const body: z.infer<typeof classifyRequestSchema> = req.body;
      res.json(classifier.quickClassify(body.text, body.hasAttachment));
    } catch (error) {
      handleRouteError(res, error, "Classify");
    }
  });

  // Direct dealflow entry points
  app.post("/api/leads", validate({ body: leadRequestSchema }), async (req: Request, res: Response) => {
    try {
      const body: z.infer<typeof leadRequestSchema> = req.body;
      res.json(await dealflow.captureLead(body.text));
    } catch (error) {
      handleRouteError(res, error, "Leads");
    }
  });

  app.post("/api/proposals", validate({ body: proposalRequestSchema }), async (req: Request, res: Response) => {
    try {
      const body: z.infer<typeof proposalRequestSchema> = req.body;
      const lead = leadFromProposalRequest(assistant, body);
      res.json(await dealflow.generateProposal(lead));
    } catch (error) {
      handleRouteError(res, error, "Proposals");
    }
  });

  app.post("/api/schedule", validate({ body: scheduleRequestSchema }), (req: Request, res: Response) => {
    try {
      const body: z.infer<typeof scheduleRequestSchema> = req.body;
      const now = body.now ? new Date(body.now) : undefined;
      res.json(dealflow.parseSchedule(body.text, now));
    } catch (error) {
      handleRouteError(res, error, "Schedule");
    }
  });

  app.post("/api/status", validate({ body: statusRequestSchema }), async (req: Request, res: Response) => {
    try {
      const body: z.infer<typeof statusRequestSchema> = req.body;
      res.json(await dealflow.classifyStatus(body.label, body.reason));
    } catch (error) {
      handleRouteError(res, error, "Status");
    }
  });

  // Operations
  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.get("/api/metrics", (_req: Request, res: Response) => {
    res.json(handler.getMetrics());
  });

  return createServer(app);
}
