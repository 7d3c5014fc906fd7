/**
 * ================================================================================
 * ECR SERVICE - Image Repository Management
 * ================================================================================
 *
 * Check-or-create access to the ECR repository a service's images are
 * published to, plus the registry credentials `docker login` needs.
 *
 * //? Repository names equal service names, so acquisition is idempotent
 */

import {
    ECRClient,
    CreateRepositoryCommand,
    DescribeRepositoriesCommand,
    GetAuthorizationTokenCommand,
    RepositoryNotFoundException,
    RepositoryAlreadyExistsException
} from '@aws-sdk/client-ecr';
import { logger } from '../utils/logger';
import { RemoteOperationError, remoteCall } from '../utils/errors';

export interface RegistryCredentials {
    username: string;
    password: string;
}

export class ImageRepositoryService {
    constructor(private readonly ecr: ECRClient) {}

    /**
     * @returns true if a repository with this name exists
     */
    async exists(name: string): Promise<boolean> {
        return remoteCall('Could not describe ECR repository', async () => {
            try {
                await this.ecr.send(new DescribeRepositoriesCommand({ repositoryNames: [name] }));
                return true;
            } catch (error) {
                if (error instanceof RepositoryNotFoundException) {
                    return false;
                }
                throw error;
            }
        });
    }

    /**
     * @returns the repository URI of the newly created repository
     */
    async create(name: string): Promise<string> {
        return remoteCall('Could not create ECR repository', async () => {
            const result = await this.ecr.send(new CreateRepositoryCommand({ repositoryName: name }));
            const uri = result.repository?.repositoryUri;

            if (!uri) {
                throw new Error(`CreateRepository returned no URI for ${name}`);
            }
            logger.debug('ECR repository created', { name, uri });
            return uri;
        });
    }

    async reference(name: string): Promise<string> {
        return remoteCall('Could not describe ECR repository', async () => {
            const result = await this.ecr.send(new DescribeRepositoriesCommand({ repositoryNames: [name] }));
            const uri = result.repositories?.[0]?.repositoryUri;

            if (!uri) {
                throw new Error(`Repository ${name} has no URI`);
            }
            return uri;
        });
    }

    /**
     * Reuse the repository if it exists, otherwise create it.
     *
     * //? A concurrent creator winning the race is treated as "exists"
     */
    async acquire(name: string): Promise<string> {
        if (await this.exists(name)) {
            logger.debug('Reusing existing ECR repository', { name });
            return this.reference(name);
        }

        try {
            return await this.create(name);
        } catch (error) {
            if (error instanceof RemoteOperationError && error.cause instanceof RepositoryAlreadyExistsException) {
                return this.reference(name);
            }
            throw error;
        }
    }

    /**
     * Decode the registry authorization token into docker login credentials.
     */
    async credentials(): Promise<RegistryCredentials> {
        return remoteCall('Could not get ECR authorization token', async () => {
            const result = await this.ecr.send(new GetAuthorizationTokenCommand({}));
            const token = result.authorizationData?.[0]?.authorizationToken;

            if (!token) {
                throw new Error('GetAuthorizationToken returned no token');
            }

            const decoded = Buffer.from(token, 'base64').toString('utf-8');
            const separator = decoded.indexOf(':');

            if (separator < 0) {
                throw new Error('Authorization token is not in the form user:password');
            }
            return {
                username: decoded.slice(0, separator),
                password: decoded.slice(separator + 1)
            };
        });
    }
}
