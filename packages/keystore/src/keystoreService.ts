import type {KeystoreRepositoryFactory, ServiceResult} from './contracts.js';
import {toServiceFailure} from './errors.js';

/**
 * Orchestration seam for keystore creation, kept apart from the repository so
 * the HTTP layer can be exercised against a stand-in.
 */
export type KeystoreService = {
  create: (controller: string) => Promise<ServiceResult<string>>;
};

export const createKeystoreService = ({
  repositoryFactory
}: {
  repositoryFactory: KeystoreRepositoryFactory;
}): KeystoreService => ({
  create: async controller => {
    try {
      const repository = await repositoryFactory.open();
      return {ok: true, value: await repository.create(controller)};
    } catch (error) {
      return toServiceFailure(error);
    }
  }
});
