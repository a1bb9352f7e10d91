// routes/index.ts
import { ControllerRegistry } from '../core/controllerRegistry';
import { createAdminController, AdminControllerDeps } from '../modules/admin/adminController';
import { createFileUploadController } from '../modules/uploads/fileUploadController';
import { createUserController, UserControllerDeps } from '../modules/users/userController';
import logger from '../utils/logger';

export type ControllerDeps = UserControllerDeps & AdminControllerDeps;

/** Registers every application controller; a duplicate route prefix aborts startup. */
export function registerControllers(registry: ControllerRegistry, deps: ControllerDeps): string[] {
  const controllers = [createUserController(deps), createAdminController(deps), createFileUploadController()];
  const prefixes = controllers.map((controller) => registry.register(controller));
  logger.info('Controllers registered', { routes: prefixes });
  return prefixes;
}
