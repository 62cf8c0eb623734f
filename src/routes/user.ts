import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { Orchestrator } from '../agent/orchestrator/Orchestrator.js';
import type { CartStore } from '../cart/CartStore.js';
import { fromCents } from '../cart/money.js';
import type { ICommerceStore } from '../commerce/ICommerceStore.js';
import type { Order } from '../commerce/types.js';
import type { VoucherService } from '../commerce/VoucherService.js';
import { config } from '../config.js';
import { getClientIpWithFallback } from '../http/clientIp.js';
import { sendError } from '../http/errorReply.js';
import { sessionIdFromIp } from '../http/session.js';
import { withTimeout } from '../http/timeout.js';
import { enforceQueryLimits } from '../validation/queryLimits.js';

export const queryRequestSchema = z.object({
  query: z.string().trim().min(1, 'query is required'),
  min_similarity: z.coerce.number().min(0).max(1).optional(),
});

export type QueryRequestBody = z.input<typeof queryRequestSchema>;

export interface UserRouteOptions {
  orchestrator: Pick<Orchestrator, 'route'>;
  cartStore: CartStore;
  commerceStore: ICommerceStore;
  voucherService: VoucherService;
}

function sessionFor(request: FastifyRequest): string {
  return sessionIdFromIp(getClientIpWithFallback(request.raw));
}

function orderToJson(order: Order) {
  return {
    order_id: order.id,
    voucher_code: order.voucherCode,
    total_amount: fromCents(order.totalCents),
    status: order.status,
    created_at: order.createdAt.toISOString(),
    items: order.items.map((item) => ({
      product_id: item.productId,
      product_name: item.productName,
      quantity: item.quantity,
      unit_price: fromCents(item.unitPriceCents),
      subtotal: fromCents(item.subtotalCents),
    })),
  };
}

export async function userRoutes(fastify: FastifyInstance, options: UserRouteOptions) {
  const { orchestrator, cartStore, commerceStore, voucherService } = options;

  fastify.post<{ Body: QueryRequestBody }>('/user/query', async (request, reply: FastifyReply) => {
    try {
      const body = queryRequestSchema.parse(request.body);
      enforceQueryLimits(body.query, { maxChars: config.limits.maxQueryChars });

      const sessionId = sessionFor(request);
      const minSimilarity = body.min_similarity ?? config.retrieval.defaultSimilarityThreshold;

      const result = await orchestrator.route(body.query, sessionId, minSimilarity);

      return reply.send({
        input: Object.keys(result.searchParameters).length > 0
          ? result.searchParameters
          : { query: body.query },
        answer: result.responseText,
        agents_used: result.handlersUsed,
        routing_mode: result.routingMode,
        sources: result.sources.map((source) => ({
          content: source.document.pageContent,
          metadata: source.document.metadata,
          similarity: source.similarity,
        })),
        session_id: sessionId,
      });
    } catch (error) {
      return sendError(fastify.log, request, reply, error);
    }
  });

  fastify.post('/user/vouchers/generate', async (request, reply: FastifyReply) => {
    try {
      const sessionId = sessionFor(request);
      const { voucher, created } = await withTimeout(
        () => voucherService.issue(sessionId),
        config.timeouts.dbMs,
        'vouchers.generate'
      );
      return reply.send({
        voucher_code: voucher.code,
        amount: fromCents(voucher.amountCents),
        created,
        session_id: sessionId,
      });
    } catch (error) {
      return sendError(fastify.log, request, reply, error);
    }
  });

  fastify.get('/user/cart', async (request, reply: FastifyReply) => {
    const sessionId = sessionFor(request);
    return reply.send({ ...cartStore.getSummary(sessionId), session_id: sessionId });
  });

  fastify.get('/user/orders', async (request, reply: FastifyReply) => {
    try {
      const sessionId = sessionFor(request);
      const orders = await withTimeout(
        () => commerceStore.listOrders(sessionId),
        config.timeouts.ordersMs,
        'orders.list'
      );
      return reply.send({ orders: orders.map(orderToJson), session_id: sessionId });
    } catch (error) {
      return sendError(fastify.log, request, reply, error);
    }
  });
}
