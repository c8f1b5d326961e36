export { createPostgresEntityRepository } from "./registry-entities.repo";
