import {
  EntityIdRequestSchema,
  EntityRegistrationSchema,
  PutAccessGroupRequestSchema,
  RegisterEntityResponseSchema,
  RegistryMutationResponseSchema,
  SetEntityEnabledRequestSchema,
  SetSafetyStatusRequestSchema,
} from "@repo/zod-types";
import { z } from "zod";

import { adminProcedure, router } from "../../trpc";

export const createRegistryRouter = (implementations: {
  register: (
    input: z.infer<typeof EntityRegistrationSchema>,
  ) => Promise<z.infer<typeof RegisterEntityResponseSchema>>;
  remove: (
    input: z.infer<typeof EntityIdRequestSchema>,
  ) => Promise<z.infer<typeof RegistryMutationResponseSchema>>;
  setEnabled: (
    input: z.infer<typeof SetEntityEnabledRequestSchema>,
  ) => Promise<z.infer<typeof RegisterEntityResponseSchema>>;
  setSafetyStatus: (
    input: z.infer<typeof SetSafetyStatusRequestSchema>,
  ) => Promise<z.infer<typeof RegisterEntityResponseSchema>>;
  putGroup: (
    input: z.infer<typeof PutAccessGroupRequestSchema>,
  ) => Promise<z.infer<typeof RegistryMutationResponseSchema>>;
}) => {
  return router({
    // Upsert: re-registering identical content is a no-op
    register: adminProcedure
      .input(EntityRegistrationSchema)
      .output(RegisterEntityResponseSchema)
      .mutation(async ({ input }) => {
        return implementations.register(input);
      }),

    remove: adminProcedure
      .input(EntityIdRequestSchema)
      .output(RegistryMutationResponseSchema)
      .mutation(async ({ input }) => {
        return implementations.remove(input);
      }),

    setEnabled: adminProcedure
      .input(SetEntityEnabledRequestSchema)
      .output(RegisterEntityResponseSchema)
      .mutation(async ({ input }) => {
        return implementations.setEnabled(input);
      }),

    setSafetyStatus: adminProcedure
      .input(SetSafetyStatusRequestSchema)
      .output(RegisterEntityResponseSchema)
      .mutation(async ({ input }) => {
        return implementations.setSafetyStatus(input);
      }),

    putGroup: adminProcedure
      .input(PutAccessGroupRequestSchema)
      .output(RegistryMutationResponseSchema)
      .mutation(async ({ input }) => {
        return implementations.putGroup(input);
      }),
  });
};
