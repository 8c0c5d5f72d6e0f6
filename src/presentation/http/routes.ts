import { Router, Request, Response, NextFunction } from "express";
import { z } from "zod";
import { AppError } from "../../application/errors";
import { AuctionRegistry } from "../../application/ports/repositories";
import { PlaceBidUseCase } from "../../application/usecases/placeBid";
import { StartAuctionUseCase } from "../../application/usecases/startAuction";

const channelIdSchema = z.string().regex(/^[\w-]{1,64}$/, "Invalid channel id");

export type RouterDependencies = {
  startAuction: StartAuctionUseCase;
  placeBid: PlaceBidUseCase;
  registry: AuctionRegistry;
  adminToken: string;
};

export function createRouter(deps: RouterDependencies): Router {
  const router = Router();

  const moderatorGuard = (req: Request, res: Response, next: NextFunction) => {
    if (!deps.adminToken) {
      return next();
    }
    const token = req.header("x-admin-token");
    if (!token || token !== deps.adminToken) {
      return res.status(401).json({ error: "UNAUTHORIZED", message: "Invalid admin token" });
    }
    return next();
  };

  router.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  router.post("/channels/:channelId/auction", moderatorGuard, async (req, res, next) => {
    try {
      const { channelId } = z.object({ channelId: channelIdSchema }).parse(req.params);
      const body = z
        .object({
          item: z.string().trim().min(1).max(200),
          duration: z.string().min(1)
        })
        .parse(req.body);
      const auction = await deps.startAuction.execute({
        channelId,
        item: body.item,
        durationText: body.duration
      });
      res.status(201).json({
        channelId: auction.channelId,
        item: auction.item,
        startTime: auction.startTime,
        endTime: auction.endTime
      });
    } catch (error) {
      next(error);
    }
  });

  // Public view of a running auction. Only the bidder count is shown; amounts and ids stay private.
  router.get("/channels/:channelId/auction", async (req, res, next) => {
    try {
      const { channelId } = z.object({ channelId: channelIdSchema }).parse(req.params);
      const auction = await deps.registry.findByChannel(channelId);
      if (!auction) {
        throw new AppError("No active auction in this channel", 404, "NO_ACTIVE_AUCTION");
      }
      res.json({
        channelId: auction.channelId,
        item: auction.item,
        duration: auction.durationText,
        startTime: auction.startTime,
        endTime: auction.endTime,
        bidders: auction.bids.size
      });
    } catch (error) {
      next(error);
    }
  });

  router.post("/channels/:channelId/bids", async (req, res, next) => {
    try {
      const { channelId } = z.object({ channelId: channelIdSchema }).parse(req.params);
      const body = z.object({ userId: z.string().min(1), bid: z.string().min(1) }).parse(req.body);
      const result = await deps.placeBid.execute({
        channelId,
        bidderId: body.userId,
        bidText: body.bid
      });
      res.status(201).json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
