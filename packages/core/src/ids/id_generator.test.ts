import {
  generateSpecId,
  generateStandaloneId,
  generatePlanId,
  generateEpicId,
  generateTaskId,
  nextPlanLetter,
  nextEpicChar,
} from './id_generator';
import { formatId } from './id_parser';

describe('ID Generators', () => {
  describe('generateSpecId / generateStandaloneId', () => {
    it('should build a spec ID from the allocated number', async () => {
      const allocator = { allocateSpecNumber: jest.fn().mockResolvedValue(54) };

      const spec = await generateSpecId('p', allocator);

      expect(formatId(spec)).toBe('p-054');
      expect(allocator.allocateSpecNumber).toHaveBeenCalledTimes(1);
    });

    it('should build a standalone ID from the allocated number', async () => {
      const allocator = { allocateStandaloneNumber: jest.fn().mockResolvedValue(17) };

      const standalone = await generateStandaloneId('p', allocator);

      expect(formatId(standalone)).toBe('p-s017');
    });

    it('should propagate allocation failures', async () => {
      const allocator = { allocateSpecNumber: jest.fn().mockRejectedValue(new Error('branch missing')) };

      await expect(generateSpecId('p', allocator)).rejects.toThrow('branch missing');
    });
  });

  describe('generatePlanId / generateEpicId / generateTaskId', () => {
    it('should compose children from their parent', async () => {
      const spec = await generateSpecId('p', { allocateSpecNumber: async () => 3 });
      const plan = generatePlanId(spec, 'A');
      const epic = generateEpicId(plan, 'b');
      const task = generateTaskId(epic, 1);

      expect(formatId(plan)).toBe('p-003A');
      expect(formatId(epic)).toBe('p-003A-b');
      expect(formatId(task)).toBe('p-003A-b.1');
    });
  });

  describe('nextPlanLetter', () => {
    it('should start at A and skip used letters', () => {
      expect(nextPlanLetter([])).toBe('A');
      expect(nextPlanLetter(['A', 'B'])).toBe('C');
      expect(nextPlanLetter(['B'])).toBe('A');
    });

    it('should continue with lowercase after Z', () => {
      expect(nextPlanLetter('ABCDEFGHIJKLMNOPQRSTUVWXYZ'.split(''))).toBe('a');
    });

    it('should throw when all letters are used', () => {
      const all = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'.split('');
      expect(() => nextPlanLetter(all)).toThrow('All plan letters exhausted');
    });
  });

  describe('nextEpicChar', () => {
    it('should go digits, lowercase, uppercase', () => {
      expect(nextEpicChar([])).toBe('0');
      expect(nextEpicChar('0123456789'.split(''))).toBe('a');
      expect(nextEpicChar('0123456789abcdefghijklmnopqrstuvwxyz'.split(''))).toBe('A');
    });
  });
});
