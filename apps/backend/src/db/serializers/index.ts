export { RegistryEntitiesSerializer } from "./registry-entities.serializer";
