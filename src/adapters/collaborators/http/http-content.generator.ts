import { plainToInstance } from 'class-transformer';
import { IsNotEmpty, IsString, validate } from 'class-validator';
import { CallOptions, ContentGenerator, DownstreamError, JsonObject } from '../../../core';
import { HttpJsonClient, HttpJsonClientConfig } from './http-json.client';

class GeneratedContentResponseDto {
  @IsString()
  @IsNotEmpty()
  content!: string;
}

/**
 * Content generation API: POST /generate { input, enrichment } -> { content }
 */
export class HttpContentGenerator implements ContentGenerator {
  readonly name = 'http-content';
  private readonly client: HttpJsonClient;

  constructor(config: Omit<HttpJsonClientConfig, 'name'>) {
    this.client = new HttpJsonClient({ ...config, name: this.name });
  }

  async generateContent(
    input: JsonObject,
    enrichmentData: JsonObject | null,
    options: CallOptions = {},
  ): Promise<string> {
    const body = await this.client.post('/generate', { input, enrichment: enrichmentData }, options);
    const dto = plainToInstance(GeneratedContentResponseDto, body);

    // An empty report is a failed generation, and asking again may help
    if ((await validate(dto)).length > 0) {
      throw new DownstreamError('Content API returned no content', this.name, true);
    }
    return dto.content;
  }
}
