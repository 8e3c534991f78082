import { normalizeCustomer, toDateString } from './customer-normalizer';

describe('normalizeCustomer', () => {
    it('should trim, lower-case and default an uploaded row', () => {
        expect(
            normalizeCustomer({
                name: '  Ada Park ',
                email: ' Ada.Park@Example.COM ',
                phone: '   ',
                registrationDate: '2023-01-15',
                lastTransactionDate: 'someday',
            }),
        ).toEqual({
            name: 'Ada Park',
            email: 'ada.park@example.com',
            phone: null,
            registrationDate: '2023-01-15',
            lastTransactionDate: null,
            transactionCount: 0,
            totalSpent: 0,
            engagementScore: 50,
            supportTickets: 0,
        });
    });

    it('should name anonymous customers Unknown', () => {
        const customer = normalizeCustomer({ email: 'x@example.com', name: ' ' });
        expect(customer.name).toBe('Unknown');
    });

    it('should keep provided counters', () => {
        const customer = normalizeCustomer({
            email: 'x@example.com',
            transactionCount: 7,
            totalSpent: 123.45,
            engagementScore: 0,
            supportTickets: 2,
        });

        expect(customer).toMatchObject({
            transactionCount: 7,
            totalSpent: 123.45,
            engagementScore: 0,
            supportTickets: 2,
        });
    });
});

describe('toDateString', () => {
    it('should render parseable dates as YYYY-MM-DD', () => {
        expect(toDateString('2024-03-05T18:30:00Z')).toBe('2024-03-05');
        expect(toDateString(new Date('2024-12-31T00:00:00Z'))).toBe('2024-12-31');
    });

    it('should return null for anything else', () => {
        expect(toDateString('unknown')).toBeNull();
        expect(toDateString('')).toBeNull();
        expect(toDateString(undefined)).toBeNull();
    });
});
