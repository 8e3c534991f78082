import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { CUSTOMER_STORE } from '../customers/interfaces/customer-store.interface';
import { Feedback } from './feedback.entity';
import { FeedbackService } from './feedback.service';

describe('FeedbackService', () => {
    let service: FeedbackService;

    const mockFeedbackRepository = {
        create: jest.fn((data: Partial<Feedback>) => data),
        save: jest.fn(),
        find: jest.fn(),
    };

    const mockStore = {
        getCustomerDetail: jest.fn(),
    };

    beforeEach(async () => {
        jest.clearAllMocks();

        const module: TestingModule = await Test.createTestingModule({
            providers: [
                FeedbackService,
                {
                    provide: getRepositoryToken(Feedback),
                    useValue: mockFeedbackRepository,
                },
                { provide: CUSTOMER_STORE, useValue: mockStore },
            ],
        }).compile();

        service = module.get<FeedbackService>(FeedbackService);
    });

    describe('add', () => {
        it('should store feedback with its sentiment', async () => {
            mockStore.getCustomerDetail.mockResolvedValue({ id: 3 });
            mockFeedbackRepository.save.mockImplementation(async (f) => ({
                id: 12,
                ...f,
            }));

            const feedback = await service.add({
                customerId: 3,
                feedbackText: 'The support was terrible',
            });

            expect(mockFeedbackRepository.create).toHaveBeenCalledWith({
                customerId: 3,
                feedbackText: 'The support was terrible',
                sentiment: 'negative',
                sentimentScore: 0.2,
                source: 'manual',
            });
            expect(feedback.id).toBe(12);
        });

        it('should reject feedback for an unknown customer', async () => {
            mockStore.getCustomerDetail.mockResolvedValue(null);

            await expect(
                service.add({ customerId: 404, feedbackText: 'hello' }),
            ).rejects.toThrow(NotFoundException);
            expect(mockFeedbackRepository.save).not.toHaveBeenCalled();
        });
    });

    describe('recent', () => {
        it('should return the latest feedback with customer names', async () => {
            const createdAt = new Date('2024-06-01T10:00:00Z');
            mockFeedbackRepository.find.mockResolvedValue([
                {
                    id: 2,
                    customerId: 3,
                    customer: { name: 'Ada Park' },
                    feedbackText: 'Great app',
                    sentiment: 'positive',
                    sentimentScore: 0.8,
                    source: 'survey',
                    createdAt,
                },
            ]);

            const recent = await service.recent(5);

            expect(mockFeedbackRepository.find).toHaveBeenCalledWith({
                relations: { customer: true },
                order: { createdAt: 'DESC', id: 'DESC' },
                take: 5,
            });
            expect(recent).toEqual([
                {
                    id: 2,
                    customerId: 3,
                    customerName: 'Ada Park',
                    feedbackText: 'Great app',
                    sentiment: 'positive',
                    sentimentScore: 0.8,
                    source: 'survey',
                    createdAt,
                },
            ]);
        });
    });
});
