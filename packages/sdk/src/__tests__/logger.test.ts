import { describe, expect, it } from 'vitest';
import { isLogLevel, phaseLevel } from '../logger.js';
import { emptyReport } from '../processor.js';

describe('phaseLevel', () => {
	it('maps each phase to its severity', () => {
		expect(phaseLevel('batch.complete')).toBe('debug');
		expect(phaseLevel('processor.start')).toBe('info');
		expect(phaseLevel('statement.error')).toBe('warn');
		expect(phaseLevel('guard.error')).toBe('warn');
		expect(phaseLevel('bind.error')).toBe('error');
		expect(phaseLevel('batch.rejected')).toBe('error');
	});
});

describe('isLogLevel', () => {
	it('accepts the four levels only', () => {
		expect(isLogLevel('debug')).toBe(true);
		expect(isLogLevel('error')).toBe(true);
		expect(isLogLevel('verbose')).toBe(false);
		expect(isLogLevel(undefined)).toBe(false);
	});
});

describe('emptyReport', () => {
	it('counts records without failures', () => {
		expect(emptyReport()).toEqual({ totalRecords: 0, failedRecords: 0, failures: [] });
		expect(emptyReport(4)).toEqual({ totalRecords: 4, failedRecords: 0, failures: [] });
	});
});
