import type { CallerScope } from "@repo/zod-types";
import { TRPCError, initTRPC } from "@trpc/server";

// Identity is resolved upstream; the backend only receives the caller's scope
export interface TrpcContext {
  user?: {
    id: string;
    callerScope: CallerScope;
  };
}

const t = initTRPC.context<TrpcContext>().create();

export const router = t.router;

export const protectedProcedure = t.procedure.use(({ ctx, next }) => {
  if (!ctx.user) {
    throw new TRPCError({ code: "UNAUTHORIZED", message: "Authentication required" });
  }
  return next({ ctx: { ...ctx, user: ctx.user } });
});

export const adminProcedure = protectedProcedure.use(({ ctx, next }) => {
  if (!ctx.user.callerScope.isAdmin) {
    throw new TRPCError({ code: "FORBIDDEN", message: "Admin access required" });
  }
  return next({ ctx });
});
