import type { Express, Request, Response } from "express";
import { createServer, type Server } from "http";
import { fromZodError } from "zod-validation-error";
import type { TokenPair, TokenLifecycleManager } from "./auth/tokenManager";
import type { ConnectionRegistry } from "./delivery/connectionRegistry";
import type { DeliveryCoordinator } from "./delivery/deliveryCoordinator";
import { getAuth, requireAuth, requireRole } from "./middleware/auth";
import { authRateLimit } from "./middleware/security";
import {
  validate,
  authSchemas,
  messageSchemas,
  type DeleteMessagesInput,
  type ListMessagesQuery,
  type LoginInput,
  type LogoutInput,
  type MarkReadInput,
  type RefreshInput,
} from "./middleware/validation";
import type { IStorage } from "./storage";
import { AuthenticationError, handleRouteError, NotFoundError, ValidationError } from "./utils/errorHandler";
import { extractBearerToken } from "./auth/authenticate";
import type { SendMessageInput } from "@shared/schema";

export interface RouteDependencies {
  storage: IStorage;
  tokens: TokenLifecycleManager;
  coordinator: DeliveryCoordinator;
  registry: ConnectionRegistry;
}

function toTokenResponse(pair: TokenPair) {
  return {
    accessToken: pair.accessToken,
    refreshToken: pair.refreshToken,
    tokenType: "Bearer",
    accessExpiresAt: pair.accessExpiresAt.toISOString(),
    refreshExpiresAt: pair.refreshExpiresAt.toISOString(),
  };
}

export async function registerRoutes(app: Express, deps: RouteDependencies): Promise<Server> {
  const { storage, tokens, coordinator, registry } = deps;
  const authenticated = requireAuth(tokens, storage);

  // Auth

  app.post("/api/auth/login", authRateLimit, validate({ body: authSchemas.login }), async (req: Request, res: Response) => {
    try {
      const { username, password }: LoginInput = req.body;
      const pair = await tokens.login(username, password);
      res.json(toTokenResponse(pair));
    } catch (error) {
      handleRouteError(res, error, "Auth");
    }
  });

  app.post("/api/auth/refresh", authRateLimit, validate({ body: authSchemas.refresh }), async (req: Request, res: Response) => {
    try {
      const { refreshToken }: RefreshInput = req.body;
      const pair = await tokens.refresh(refreshToken);
      res.json(toTokenResponse(pair));
    } catch (error) {
      handleRouteError(res, error, "Auth");
    }
  });

  app.post("/api/auth/logout", authenticated, validate({ body: authSchemas.logout }), async (req: Request, res: Response) => {
    try {
      const auth = getAuth(req);
      const { refreshToken }: LogoutInput = req.body;
      // requireAuth has already accepted this header
      const accessToken = extractBearerToken(req.headers.authorization);
      if (!accessToken) {
        throw new AuthenticationError("Missing access token");
      }
      await tokens.logout(accessToken, refreshToken, auth.id);
      res.json({ revoked: true });
    } catch (error) {
      handleRouteError(res, error, "Auth");
    }
  });

  app.get("/api/auth/profile", authenticated, async (req: Request, res: Response) => {
    try {
      const auth = getAuth(req);
      const user = await storage.getUser(auth.id);
      if (!user) {
        throw new NotFoundError("User");
      }
      res.json({
        id: user.id,
        username: user.username,
        email: user.email,
        role: user.role,
        status: user.status,
        createdAt: user.createdAt,
      });
    } catch (error) {
      handleRouteError(res, error, "Auth");
    }
  });

  // Messages

  app.post("/api/messages/send", authenticated, validate({ body: messageSchemas.send }), async (req: Request, res: Response) => {
    try {
      const auth = getAuth(req);
      const input: SendMessageInput = req.body;
      const result = await coordinator.send(auth.id, {
        title: input.title ?? null,
        content: input.content,
        recipientIds: input.recipientIds,
      });
      res.status(201).json({
        id: result.message.id,
        title: result.message.title,
        content: result.message.content,
        senderId: result.message.senderId,
        createdAt: result.message.createdAt,
        recipientIds: result.deliveredTo,
        skippedRecipientIds: result.skipped,
        state: result.state,
      });
    } catch (error) {
      handleRouteError(res, error, "Messages");
    }
  });

  app.get("/api/messages", authenticated, async (req: Request, res: Response) => {
    try {
      const auth = getAuth(req);
      const parsed = messageSchemas.list.safeParse(req.query);
      if (!parsed.success) {
        throw new ValidationError(fromZodError(parsed.error).message);
      }
      const options: ListMessagesQuery = parsed.data;
      const page = await storage.listForRecipient(auth.id, options);
      res.json(page);
    } catch (error) {
      handleRouteError(res, error, "Messages");
    }
  });

  app.post("/api/messages/mark-read", authenticated, validate({ body: messageSchemas.markRead }), async (req: Request, res: Response) => {
    try {
      const auth = getAuth(req);
      const { messageId }: MarkReadInput = req.body;
      const updatedCount = messageId
        ? await storage.markRead(auth.id, messageId)
        : await storage.markAllRead(auth.id);
      res.json({ updatedCount });
    } catch (error) {
      handleRouteError(res, error, "Messages");
    }
  });

  app.post("/api/messages/delete", authenticated, validate({ body: messageSchemas.delete }), async (req: Request, res: Response) => {
    try {
      const auth = getAuth(req);
      const { messageId, kind }: DeleteMessagesInput = req.body;
      let deletedCount: number;
      if (messageId) {
        await storage.delete(auth.id, messageId);
        deletedCount = 1;
      } else {
        deletedCount = await storage.deleteByType(auth.id, kind ?? "all");
      }
      res.json({ deletedCount });
    } catch (error) {
      handleRouteError(res, error, "Messages");
    }
  });

  // Admin

  app.post("/api/admin/tokens/sweep", authenticated, requireRole("admin"), async (_req: Request, res: Response) => {
    try {
      const purged = await tokens.sweep();
      res.json({ purged });
    } catch (error) {
      handleRouteError(res, error, "Admin");
    }
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      connections: registry.connectionCount,
      onlineUsers: registry.onlineIdentityCount,
    });
  });

  const httpServer = createServer(app);
  return httpServer;
}
