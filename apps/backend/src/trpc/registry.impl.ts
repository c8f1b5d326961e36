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

import { RegistryEntitiesSerializer } from "../db/serializers";
import {
  type EntityStore,
  draftFromRegistration,
  errorMessage,
  isRegistryError,
} from "../lib/registry";

// Registry errors carry a message meant for the caller; anything else is internal
const failure = (action: string, error: unknown) => {
  if (!isRegistryError(error)) {
    console.error(`Error during ${action}:`, error);
  }
  return {
    success: false as const,
    message: isRegistryError(error) ? error.message : `Failed to ${action}: ${errorMessage(error)}`,
  };
};

export const createRegistryImplementations = (store: EntityStore) => ({
  register: async (
    input: z.infer<typeof EntityRegistrationSchema>,
  ): Promise<z.infer<typeof RegisterEntityResponseSchema>> => {
    try {
      const entity = await store.put(draftFromRegistration(input));
      return {
        success: true,
        data: RegistryEntitiesSerializer.serializeSummary(entity),
        message: "Entity registered successfully",
      };
    } catch (error) {
      return failure("register entity", error);
    }
  },

  remove: async (
    input: z.infer<typeof EntityIdRequestSchema>,
  ): Promise<z.infer<typeof RegistryMutationResponseSchema>> => {
    try {
      await store.delete(input.id);
      return { success: true, message: "Entity removed successfully" };
    } catch (error) {
      return failure("remove entity", error);
    }
  },

  setEnabled: async (
    input: z.infer<typeof SetEntityEnabledRequestSchema>,
  ): Promise<z.infer<typeof RegisterEntityResponseSchema>> => {
    try {
      const entity = await store.setEnabled(input.id, input.enabled);
      return {
        success: true,
        data: RegistryEntitiesSerializer.serializeSummary(entity),
        message: input.enabled ? "Entity enabled" : "Entity disabled",
      };
    } catch (error) {
      return failure("update entity status", error);
    }
  },

  setSafetyStatus: async (
    input: z.infer<typeof SetSafetyStatusRequestSchema>,
  ): Promise<z.infer<typeof RegisterEntityResponseSchema>> => {
    try {
      const entity = await store.setSafetyStatus(input.id, input.safetyStatus);
      return {
        success: true,
        data: RegistryEntitiesSerializer.serializeSummary(entity),
        message: `Safety status set to ${input.safetyStatus}`,
      };
    } catch (error) {
      return failure("update safety status", error);
    }
  },

  putGroup: async (
    input: z.infer<typeof PutAccessGroupRequestSchema>,
  ): Promise<z.infer<typeof RegistryMutationResponseSchema>> => {
    try {
      const group = await store.putGroup(input.groupPath, input.memberEntityIds);
      return {
        success: true,
        message: `Access group ${group.groupPath} now has ${group.memberEntityIds.size} members`,
      };
    } catch (error) {
      return failure("update access group", error);
    }
  },
});
