import { DynamoDBClient, DynamoDBClientConfig } from "@aws-sdk/client-dynamodb";
import { inject, injectable } from 'tsyringe';
import { IConfigService } from "../../../application/interfaces/IConfigService";
import { TYPES } from "../../../shared/constants/types";

/**
 * Owns the one DynamoDBClient shared by every repository and the table manager.
 */
@injectable()
export class DynamoDBProvider {
    public readonly client: DynamoDBClient;

    constructor(
        @inject(TYPES.ConfigService) configService: IConfigService,
        client?: DynamoDBClient // Optional client for testing
    ) {
        if (client) {
            this.client = client;
            return;
        }

        const region = configService.getOrThrow('AWS_REGION');
        const endpoint = configService.get('DYNAMODB_ENDPOINT_URL');

        const clientConfig: DynamoDBClientConfig = { region };

        // Local DynamoDB accepts any credentials
        if (endpoint) {
            clientConfig.endpoint = endpoint;
            clientConfig.credentials = {
                accessKeyId: configService.get('AWS_ACCESS_KEY_ID', 'local'),
                secretAccessKey: configService.get('AWS_SECRET_ACCESS_KEY', 'local'),
            };
        }

        this.client = new DynamoDBClient(clientConfig);
    }

    destroy(): void {
        this.client.destroy();
    }
}
