import { RiskLevel } from '../churn/interfaces/churn.interface';
import {
    CustomerStore,
    CustomerWithScore,
    DashboardStats,
    HighRiskCustomer,
} from '../customers/interfaces/customer-store.interface';
import { classifyIntent, Intent } from './intent-matcher';
import {
    formatAmount,
    generateResponse,
    HELP_TEXT,
    UNKNOWN_TEXT,
} from './response-generator';

const suggestedQueries = (text: string): string[] =>
    text
        .split('\n')
        .map((line) => /^\s*• (["'])(.*)\1$/.exec(line))
        .flatMap((match) => (match ? [match[2]] : []));

const record = (id: number, name: string) => ({
    id,
    name,
    email: `${name.toLowerCase()}@example.com`,
    phone: null,
    registrationDate: '2023-01-01',
    lastTransactionDate: '2024-06-20',
    transactionCount: 3,
    totalSpent: 1234.5,
    engagementScore: 40,
    supportTickets: 1,
});

const highRisk = (id: number, churnProbability: number): HighRiskCustomer => ({
    ...record(id, `Customer${id}`),
    churnProbability,
    riskLevel: RiskLevel.HIGH,
});

const stats = (overrides: Partial<DashboardStats> = {}): DashboardStats => ({
    totalCustomers: 100,
    highRiskCount: 25,
    mediumRiskCount: 30,
    lowRiskCount: 45,
    totalRevenue: 10000,
    atRiskRevenue: 2500,
    activeCampaigns: 1,
    ...overrides,
});

describe('generateResponse', () => {
    let store: jest.Mocked<CustomerStore>;

    beforeEach(() => {
        store = {
            getHighRiskCustomers: jest.fn(),
            getCustomerDetail: jest.fn(),
            getRecentCustomers: jest.fn(),
            getCustomersWithScores: jest.fn(),
            getDashboardStats: jest.fn(),
            getChurnDistribution: jest.fn(),
            addCustomers: jest.fn(),
            saveCustomers: jest.fn(),
            addChurnScores: jest.fn(),
        };
    });

    describe('high risk', () => {
        it('should report when nobody is at risk', async () => {
            store.getHighRiskCustomers.mockResolvedValue([]);

            const response = await generateResponse(Intent.HIGH_RISK, 'high risk customers', store);

            expect(response).toEqual({
                intent: Intent.HIGH_RISK,
                text: 'Great news! There are currently no high-risk customers in your database.',
                data: [],
            });
            expect(store.getHighRiskCustomers).toHaveBeenCalledWith(0.7);
        });

        it('should list the top five and count the rest', async () => {
            const customers = [0.95, 0.9, 0.85, 0.8, 0.75, 0.72, 0.7].map(
                (p, i) => highRisk(i + 1, p),
            );
            store.getHighRiskCustomers.mockResolvedValue(customers);

            const response = await generateResponse(Intent.HIGH_RISK, '', store);

            expect(response.text).toBe(
                'I found 7 high-risk customers who are likely to churn:\n\n' +
                    '1. Customer1 - Churn Probability: 95.0%\n' +
                    '2. Customer2 - Churn Probability: 90.0%\n' +
                    '3. Customer3 - Churn Probability: 85.0%\n' +
                    '4. Customer4 - Churn Probability: 80.0%\n' +
                    '5. Customer5 - Churn Probability: 75.0%\n' +
                    '\n...and 2 more. ' +
                    '\n\nI recommend creating a retention campaign for these customers.',
            );
            expect(response.data).toBe(customers);
        });

        it('should omit the remainder line for five or fewer', async () => {
            store.getHighRiskCustomers.mockResolvedValue([highRisk(1, 0.8)]);

            const response = await generateResponse(Intent.HIGH_RISK, '', store);

            expect(response.text).toBe(
                'I found 1 high-risk customers who are likely to churn:\n\n' +
                    '1. Customer1 - Churn Probability: 80.0%\n' +
                    '\n\nI recommend creating a retention campaign for these customers.',
            );
        });
    });

    it('should summarise customer totals', async () => {
        store.getDashboardStats.mockResolvedValue(stats());

        const response = await generateResponse(Intent.TOTAL_CUSTOMERS, '', store);

        expect(response.text).toBe(
            'You have 100 customers in your database.\n\n' +
                '• High Risk: 25\n' +
                '• Medium Risk: 30\n' +
                '• Low Risk: 45',
        );
        expect(response.data).toEqual(stats());
    });

    describe('churn rate', () => {
        it('should warn above 20%', async () => {
            store.getDashboardStats.mockResolvedValue(stats());

            const response = await generateResponse(Intent.CHURN_RATE, '', store);

            expect(response.text).toBe(
                'Current churn risk analysis:\n\n' +
                    '• High-risk customers: 25 (25.0%)\n' +
                    '• Total customers: 100\n\n' +
                    '⚠️ Action needed! High churn risk detected.',
            );
            expect(response.data).toEqual({ churnRate: 25, highRisk: 25, total: 100 });
        });

        it('should reassure at exactly 20%', async () => {
            store.getDashboardStats.mockResolvedValue(stats({ highRiskCount: 20 }));

            const response = await generateResponse(Intent.CHURN_RATE, '', store);

            expect(response.text.endsWith('✓ Churn risk is under control.')).toBe(true);
        });

        it('should report 0 for an empty database', async () => {
            store.getDashboardStats.mockResolvedValue(
                stats({ totalCustomers: 0, highRiskCount: 0 }),
            );

            const response = await generateResponse(Intent.CHURN_RATE, '', store);

            expect(response.data).toEqual({ churnRate: 0, highRisk: 0, total: 0 });
            expect(response.text).toContain('• High-risk customers: 0 (0.0%)');
        });
    });

    describe('recent activity', () => {
        it('should list recent customers', async () => {
            const recent: CustomerWithScore[] = [
                {
                    ...record(1, 'Ada'),
                    churnProbability: 0.2,
                    riskLevel: RiskLevel.LOW,
                    features: null,
                    scoredAt: null,
                },
                {
                    ...record(2, 'Ben'),
                    lastTransactionDate: null,
                    churnProbability: null,
                    riskLevel: null,
                    features: null,
                    scoredAt: null,
                },
            ];
            store.getRecentCustomers.mockResolvedValue(recent);

            const response = await generateResponse(Intent.RECENT_ACTIVITY, '', store);

            expect(store.getRecentCustomers).toHaveBeenCalledWith(10);
            expect(response.text).toBe(
                'Here are the 2 most recently active customers:\n\n' +
                    '1. Ada - Last activity: 2024-06-20\n' +
                    '2. Ben - Last activity: N/A\n',
            );
        });

        it('should say when there is nothing to show', async () => {
            store.getRecentCustomers.mockResolvedValue([]);

            const response = await generateResponse(Intent.RECENT_ACTIVITY, '', store);

            expect(response).toEqual({
                intent: Intent.RECENT_ACTIVITY,
                text: 'No recent customer data available.',
                data: [],
            });
        });
    });

    describe('revenue', () => {
        it('should format amounts and the share at risk', async () => {
            store.getDashboardStats.mockResolvedValue(stats());

            const response = await generateResponse(Intent.REVENUE, '', store);

            expect(response.text).toBe(
                'Revenue Overview:\n\n' +
                    '• Total Revenue: $10,000.00\n' +
                    '• Revenue at Risk: $2,500.00\n' +
                    '• Percentage at Risk: 25.0%\n\n' +
                    'Focus on retention to protect $2,500.00 in revenue!',
            );
            expect(response.data).toEqual({ totalRevenue: 10000, atRiskRevenue: 2500 });
        });

        it('should report 0% without revenue', async () => {
            store.getDashboardStats.mockResolvedValue(
                stats({ totalRevenue: 0, atRiskRevenue: 0 }),
            );

            const response = await generateResponse(Intent.REVENUE, '', store);

            expect(response.text).toContain('• Percentage at Risk: 0.0%');
        });
    });

    describe('specific customer', () => {
        it('should describe the customer', async () => {
            store.getCustomerDetail.mockResolvedValue({
                ...record(7, 'Ada'),
                churnProbability: 0.853,
                riskLevel: RiskLevel.HIGH,
                features: null,
                scoredAt: null,
            });

            const response = await generateResponse(
                Intent.SPECIFIC_CUSTOMER,
                'Tell me about customer 7',
                store,
            );

            expect(store.getCustomerDetail).toHaveBeenCalledWith(7);
            expect(response.text).toBe(
                'Customer Details:\n\n' +
                    'Name: Ada\n' +
                    'Email: ada@example.com\n' +
                    'Churn Risk: High\n' +
                    'Churn Probability: 85.3%\n' +
                    'Total Spent: $1,234.50\n' +
                    'Transactions: 3\n',
            );
        });

        it('should fall back for an unscored customer', async () => {
            store.getCustomerDetail.mockResolvedValue({
                ...record(8, 'Ben'),
                churnProbability: null,
                riskLevel: null,
                features: null,
                scoredAt: null,
            });

            const response = await generateResponse(
                Intent.SPECIFIC_CUSTOMER,
                'customer 8',
                store,
            );

            expect(response.text).toContain('Churn Risk: Unknown\n');
            expect(response.text).toContain('Churn Probability: 0.0%\n');
        });

        it('should report an unknown id', async () => {
            store.getCustomerDetail.mockResolvedValue(null);

            const response = await generateResponse(
                Intent.SPECIFIC_CUSTOMER,
                'Show me customer 42',
                store,
            );

            expect(response).toEqual({
                intent: Intent.SPECIFIC_CUSTOMER,
                text: 'Customer with ID 42 not found.',
                data: null,
            });
        });

        it('should ask for an id when none is given', async () => {
            const response = await generateResponse(
                Intent.SPECIFIC_CUSTOMER,
                'info about a customer',
                store,
            );

            expect(response.text).toBe(
                "Please specify a customer ID. For example: 'Show me customer 123'",
            );
            expect(store.getCustomerDetail).not.toHaveBeenCalled();
        });

        it('should ask for an id when asked to show a customer', async () => {
            const message = 'show customer';

            const response = await generateResponse(
                classifyIntent(message),
                message,
                store,
            );

            expect(response).toEqual({
                intent: Intent.SPECIFIC_CUSTOMER,
                text: "Please specify a customer ID. For example: 'Show me customer 123'",
                data: null,
            });
        });

        it('should name an oversized id as typed without looking it up', async () => {
            const response = await generateResponse(
                Intent.SPECIFIC_CUSTOMER,
                'customer 9007199254740993',
                store,
            );

            expect(response.text).toBe(
                'Customer with ID 9007199254740993 not found.',
            );
            expect(response.data).toBeNull();
            expect(store.getCustomerDetail).not.toHaveBeenCalled();
        });
    });

    it('should answer help without touching the store', async () => {
        const response = await generateResponse(Intent.HELP, 'help', store);

        expect(response.text.startsWith('I can help you with:')).toBe(true);
        expect(response.data).toBeNull();
    });

    it('should suggest queries for unknown messages', async () => {
        const response = await generateResponse(Intent.UNKNOWN, 'hello', store);

        expect(response.text).toBe(
            "I'm not sure I understand that question. Here are some things you can ask me:\n\n" +
                "• 'Show me high-risk customers'\n" +
                "• 'What's our churn rate?'\n" +
                "• 'How many customers do we have?'\n" +
                "• 'Tell me about customer 123'\n\n" +
                "Type 'help' to see all available queries.",
        );
        expect(response.data).toBeNull();
    });

    it('should render store failures as text', async () => {
        store.getDashboardStats.mockRejectedValue(new Error('database is locked'));

        const response = await generateResponse(Intent.TOTAL_CUSTOMERS, '', store);

        expect(response).toEqual({
            intent: Intent.TOTAL_CUSTOMERS,
            text: 'I encountered an error processing your request: database is locked',
            data: null,
        });
    });
});

describe('formatAmount', () => {
    it('should use thousands separators and two decimals', () => {
        expect(formatAmount(1234567.891)).toBe('1,234,567.89');
        expect(formatAmount(0)).toBe('0.00');
    });
});

describe('suggested queries', () => {
    it('should list the help examples in order', () => {
        expect(suggestedQueries(HELP_TEXT)).toEqual([
            'Show me high-risk customers',
            'Who is likely to churn?',
            'How many customers do we have?',
            "What's our churn rate?",
            'Show me revenue statistics',
            'How much revenue is at risk?',
            'Tell me about customer 123',
            'Show customer information',
            'Show recent customer activity',
            'Who are our latest customers?',
        ]);
    });

    it('should list the fallback examples in order', () => {
        expect(suggestedQueries(UNKNOWN_TEXT)).toEqual([
            'Show me high-risk customers',
            "What's our churn rate?",
            'How many customers do we have?',
            'Tell me about customer 123',
        ]);
    });

    it.each([
        ['Show me high-risk customers', Intent.HIGH_RISK],
        ['Who is likely to churn?', Intent.HIGH_RISK],
        ['How many customers do we have?', Intent.TOTAL_CUSTOMERS],
        ["What's our churn rate?", Intent.CHURN_RATE],
        ['Show me revenue statistics', Intent.REVENUE],
        ['How much revenue is at risk?', Intent.REVENUE],
        ['Tell me about customer 123', Intent.SPECIFIC_CUSTOMER],
        ['Show customer information', Intent.SPECIFIC_CUSTOMER],
        ['Show recent customer activity', Intent.RECENT_ACTIVITY],
        ['Who are our latest customers?', Intent.RECENT_ACTIVITY],
    ])('should classify the suggestion "%s" as %s', (query, expected) => {
        expect(classifyIntent(query)).toBe(expected);
    });
});
