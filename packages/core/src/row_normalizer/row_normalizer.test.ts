import { normalizeSourceRow, parseRowId, readCell, hasRequiredColumns } from './index';

describe('RowNormalizer', () => {
  describe('parseRowId', () => {
    it('should parse integer ids', () => {
      expect(parseRowId('42')).toBe(42);
    });

    it('should accept float-formatted integers', () => {
      expect(parseRowId('7.0')).toBe(7);
    });

    it('should reject fractional ids', () => {
      expect(parseRowId('7.5')).toBeNull();
    });

    it('should reject non-numeric ids', () => {
      expect(parseRowId('abc')).toBeNull();
    });

    it('should reject hex, exponent and signed forms', () => {
      expect(parseRowId('0x1A')).toBeNull();
      expect(parseRowId('1e3')).toBeNull();
      expect(parseRowId('-0')).toBeNull();
      expect(parseRowId('-4')).toBeNull();
      expect(parseRowId('+4')).toBeNull();
    });

    it('should reject ids beyond the safe integer range', () => {
      expect(parseRowId('9007199254740993')).toBeNull();
    });

    it('should reject missing ids', () => {
      expect(parseRowId(undefined)).toBeNull();
    });
  });

  describe('readCell', () => {
    it('should trim values', () => {
      expect(readCell({ Status: '  ip ' }, 'Status')).toBe('ip');
    });

    it('should treat blank cells as absent', () => {
      expect(readCell({ Status: '   ' }, 'Status')).toBeUndefined();
    });

    it('should treat missing columns as absent', () => {
      expect(readCell({}, 'Status')).toBeUndefined();
    });
  });

  describe('normalizeSourceRow', () => {
    it('should map every export column', () => {
      const row = normalizeSourceRow({
        'Id': '12',
        'Task Name': 'Comp v1',
        'Link': 'Shot/010',
        'Pipeline Step': 'Comp',
        'Status': 'ip',
        'Assigned To': 'Jane Doe',
        'Reviewer': 'John Roe',
        'Start Date': '2024-05-01',
        'Due Date': '2024-05-10',
        'Shot > Shot Status': 'ip',
        'Project': 'Demo',
        'Thumbnail': 'https://example.com/thumb.png',
      });

      expect(row).toEqual({
        id: 12,
        taskName: 'Comp v1',
        link: 'Shot/010',
        pipelineStep: 'Comp',
        status: 'ip',
        assignedTo: 'Jane Doe',
        reviewer: 'John Roe',
        startDate: '2024-05-01',
        dueDate: '2024-05-10',
        shotStatus: 'ip',
        project: 'Demo',
        thumbnail: 'https://example.com/thumb.png',
      });
    });

    it('should represent blank fields as undefined rather than empty strings', () => {
      const row = normalizeSourceRow({ 'Id': '3', 'Task Name': '', 'Status': ' ' });

      expect(row?.id).toBe(3);
      expect(row?.taskName).toBeUndefined();
      expect(row?.status).toBeUndefined();
    });

    it('should return null when the id is missing', () => {
      expect(normalizeSourceRow({ 'Task Name': 'Orphan' })).toBeNull();
    });

    it('should return null when the id is blank', () => {
      expect(normalizeSourceRow({ 'Id': '', 'Task Name': 'Orphan' })).toBeNull();
    });
  });

  describe('hasRequiredColumns', () => {
    it('should accept headers with an Id column', () => {
      expect(hasRequiredColumns(['Task Name', 'Id'])).toBe(true);
    });

    it('should reject headers without an Id column', () => {
      expect(hasRequiredColumns(['Task Name', 'Status'])).toBe(false);
    });
  });
});
