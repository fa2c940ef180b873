import { selectionCheckSchema, timetableRequestSchema } from '../request';

describe('request schemas', () => {
  describe('selectionCheckSchema', () => {
    it('should default the selected list', () => {
      const parsed = selectionCheckSchema.parse({ candidates: [{ courseCode: 'A001', classNo: '1' }] });
      expect(parsed).toEqual({ selected: [], candidates: [{ courseCode: 'A001', classNo: '1' }] });
    });

    it('should trim uid fields', () => {
      const parsed = selectionCheckSchema.parse({ candidates: [{ courseCode: ' A001 ', classNo: ' 1' }] });
      expect(parsed.candidates).toEqual([{ courseCode: 'A001', classNo: '1' }]);
    });

    it('should require candidates and a positive credit limit', () => {
      expect(selectionCheckSchema.safeParse({ candidates: [] }).success).toBe(false);
      expect(
        selectionCheckSchema.safeParse({ candidates: [{ courseCode: 'A001', classNo: '1' }], creditLimit: -1 }).success
      ).toBe(false);
    });
  });

  describe('timetableRequestSchema', () => {
    it('should only accept term weeks', () => {
      expect(timetableRequestSchema.safeParse({ week: 16 }).success).toBe(true);
      expect(timetableRequestSchema.safeParse({ week: 17 }).success).toBe(false);
      expect(timetableRequestSchema.safeParse({ week: 0 }).success).toBe(false);
    });
  });
});
