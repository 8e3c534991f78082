import { Test, TestingModule } from '@nestjs/testing';
import { Job } from 'bullmq';
import { CampaignProcessor } from './campaign.processor';
import {
    CampaignDispatchJobData,
    CampaignDispatchResult,
    CampaignsService,
} from './campaigns.service';

describe('CampaignProcessor', () => {
    let processor: CampaignProcessor;

    const mockCampaignsService = {
        dispatch: jest.fn(),
    };

    const job = {
        data: { campaignId: 1, dispatchId: 'run-1' },
        attemptsMade: 0,
    } as unknown as Job<CampaignDispatchJobData, CampaignDispatchResult, string>;

    beforeEach(async () => {
        jest.clearAllMocks();

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                CampaignProcessor,
                { provide: CampaignsService, useValue: mockCampaignsService },
            ],
        }).compile();

        processor = module.get<CampaignProcessor>(CampaignProcessor);
    });

    it('should dispatch the campaign named by the job', async () => {
        const result = {
            campaignId: 1,
            dispatchId: 'run-1',
            recipients: 3,
            eventsCreated: 3,
        };
        mockCampaignsService.dispatch.mockResolvedValue(result);

        await expect(processor.process(job)).resolves.toEqual(result);
        expect(mockCampaignsService.dispatch).toHaveBeenCalledWith(1, 'run-1');
    });

    it('should rethrow so the queue retries', async () => {
        mockCampaignsService.dispatch.mockRejectedValue(
            new Error('Campaign with ID 1 not found'),
        );

        await expect(processor.process(job)).rejects.toThrow(
            'Campaign with ID 1 not found',
        );
    });
});
