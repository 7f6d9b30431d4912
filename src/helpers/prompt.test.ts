import { describe, it, expect, beforeEach, vi } from 'vitest';

const mockInquirer = vi.hoisted(() => ({
  prompt: vi.fn()
}));

vi.mock('inquirer', () => ({
  default: mockInquirer
}));

import { promptConfirmation } from './prompt';

describe('prompt', () => {
  beforeEach(() => {
    mockInquirer.prompt.mockReset();
  });

  describe('promptConfirmation', () => {
    it('should return true when user confirms', async () => {
      mockInquirer.prompt.mockResolvedValue({ confirmed: true });

      const result = await promptConfirmation('Prune snapshots?');

      expect(result).toBe(true);
      expect(mockInquirer.prompt).toHaveBeenCalledWith([
        {
          type: 'confirm',
          name: 'confirmed',
          message: 'Prune snapshots?',
          default: false
        }
      ]);
    });

    it('should return false when user declines', async () => {
      mockInquirer.prompt.mockResolvedValue({ confirmed: false });

      expect(await promptConfirmation('Prune snapshots?')).toBe(false);
    });

    it('should use custom default value', async () => {
      mockInquirer.prompt.mockResolvedValue({ confirmed: true });

      await promptConfirmation('Prune snapshots?', true);

      expect(mockInquirer.prompt).toHaveBeenCalledWith([
        {
          type: 'confirm',
          name: 'confirmed',
          message: 'Prune snapshots?',
          default: true
        }
      ]);
    });
  });
});
