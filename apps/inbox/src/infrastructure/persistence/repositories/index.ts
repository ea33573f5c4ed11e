export { createUserRepository, type UserRepository, type UserRepositoryDeps } from './user-repository.js';
