import { Test } from '@nestjs/testing';
import { NotFoundError } from '../common/errors';
import { JobsController } from './jobs.controller';
import { JobsService } from './jobs.service';

describe('JobsController', () => {
  const service = {
    submit: jest.fn(),
    getStatus: jest.fn(),
    reprocess: jest.fn(),
  };
  let controller: JobsController;

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [JobsController],
      providers: [{ provide: JobsService, useValue: service }],
    }).compile();
    controller = moduleRef.get(JobsController);
  });

  it('hands the raw body to submission', async () => {
    service.submit.mockResolvedValue({ jobId: 'job-1', status: 'IN_PROGRESS' });
    const body = { campaignId: 'cmp-1', posts: [] };

    await expect(controller.create(body)).resolves.toEqual({ jobId: 'job-1', status: 'IN_PROGRESS' });
    expect(service.submit).toHaveBeenCalledWith(body);
  });

  it('propagates NotFoundError for unknown jobs', async () => {
    service.getStatus.mockRejectedValue(new NotFoundError('missing'));

    await expect(controller.findOne('missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('delegates reprocess by id', async () => {
    service.reprocess.mockResolvedValue({ jobId: 'job-1', status: 'PENDING' });

    await controller.reprocess('job-1');

    expect(service.reprocess).toHaveBeenCalledWith('job-1');
  });
});
