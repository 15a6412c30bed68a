import { plainToInstance } from 'class-transformer';
import { IsObject, validate } from 'class-validator';
import { CallOptions, DownstreamError, EnrichmentProvider, JsonObject } from '../../../core';
import { HttpJsonClient, HttpJsonClientConfig } from './http-json.client';

class EnrichmentResponseDto {
  @IsObject()
  data!: JsonObject;
}

/**
 * Enrichment API: POST /enrichment { input } -> { data }
 */
export class HttpEnrichmentProvider implements EnrichmentProvider {
  readonly name = 'http-enrichment';
  private readonly client: HttpJsonClient;

  constructor(config: Omit<HttpJsonClientConfig, 'name'>) {
    this.client = new HttpJsonClient({ ...config, name: this.name });
  }

  async fetchEnrichmentData(input: JsonObject, options: CallOptions = {}): Promise<JsonObject> {
    const body = await this.client.post('/enrichment', { input }, options);
    const dto = plainToInstance(EnrichmentResponseDto, body);

    if ((await validate(dto)).length > 0) {
      throw new DownstreamError('Enrichment API returned no data object', this.name, false);
    }
    return dto.data;
  }
}
