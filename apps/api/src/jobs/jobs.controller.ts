import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { ApiBody, ApiOperation, ApiTags } from '@nestjs/swagger';
import { JobsService } from './jobs.service';

@ApiTags('content-analysis')
@Controller('api/v1/content-analysis/jobs')
export class JobsController {
  constructor(private readonly jobsService: JobsService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @ApiOperation({ summary: 'Create an async content analysis job for a campaign' })
  @ApiBody({
    schema: {
      type: 'object',
      required: ['campaignId', 'creatorId', 'posts'],
      properties: {
        campaignId: { type: 'string', example: 'cmp_456' },
        creatorId: { type: 'string', example: 'creator_123' },
        posts: {
          type: 'array',
          minItems: 1,
          items: {
            type: 'object',
            required: ['postId', 'media'],
            properties: {
              postId: { type: 'string', example: 'post_1' },
              media: {
                type: 'array',
                minItems: 1,
                items: {
                  type: 'object',
                  required: ['mediaId', 'type', 'url'],
                  properties: {
                    mediaId: { type: 'string', example: 'm1' },
                    type: { type: 'string', enum: ['image', 'video'] },
                    url: { type: 'string', format: 'uri' },
                  },
                },
              },
            },
          },
        },
      },
    },
  })
  async create(@Body() body: unknown) {
    return this.jobsService.submit(body);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get job status and results' })
  async findOne(@Param('id') id: string) {
    return this.jobsService.getStatus(id);
  }

  @Post(':id/reprocess')
  @ApiOperation({ summary: 'Reset a finished or stuck job and analyze it again' })
  async reprocess(@Param('id') id: string) {
    return this.jobsService.reprocess(id);
  }
}
