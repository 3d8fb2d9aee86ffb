import { describe, it, expect } from 'vitest';
import {
  advanceStatus,
  canTransition,
  isFailureStatus,
  statusFromSituation,
} from '../../src/domain/entities/title.js';

describe('Title', () => {
  describe('statusFromSituation', () => {
    it('deve mapear situações conhecidas', () => {
      expect(statusFromSituation('SALVO')).toBe('pending');
      expect(statusFromSituation('EMITIDO')).toBe('accepted');
      expect(statusFromSituation('REGISTRADO')).toBe('accepted');
      expect(statusFromSituation('LIQUIDADO')).toBe('paid');
      expect(statusFromSituation('PAGO')).toBe('paid');
      expect(statusFromSituation('REJEITADO')).toBe('rejected');
      expect(statusFromSituation('FALHA')).toBe('failed');
    });

    it('deve ignorar caixa e espaços', () => {
      expect(statusFromSituation(' emitido ')).toBe('accepted');
    });

    it('deve tratar situação desconhecida ou vazia como pendente', () => {
      expect(statusFromSituation('QUALQUER')).toBe('pending');
      expect(statusFromSituation('')).toBe('pending');
      expect(statusFromSituation(undefined)).toBe('pending');
    });
  });

  describe('transições', () => {
    it('deve permitir avanço de aceito para pago ou rejeitado', () => {
      expect(advanceStatus('accepted', 'paid')).toBe('paid');
      expect(advanceStatus('accepted', 'rejected')).toBe('rejected');
    });

    it('deve manter estados terminais', () => {
      expect(advanceStatus('paid', 'accepted')).toBe('paid');
      expect(advanceStatus('rejected', 'paid')).toBe('rejected');
    });

    it('deve impedir retorno de aceito para pendente', () => {
      expect(canTransition('accepted', 'pending')).toBe(false);
      expect(advanceStatus('accepted', 'pending')).toBe('accepted');
    });

    it('deve permitir falha ser aceita depois', () => {
      expect(canTransition('failed', 'accepted')).toBe(true);
    });

    it('deve identificar status de falha', () => {
      expect(isFailureStatus('rejected')).toBe(true);
      expect(isFailureStatus('failed')).toBe(true);
      expect(isFailureStatus('paid')).toBe(false);
      expect(isFailureStatus('accepted')).toBe(false);
    });
  });
});
