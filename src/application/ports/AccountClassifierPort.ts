import type { Classification } from '../../domain/entities/Classification.js';

export interface AccountClassifierPort {
  classify(fileName: string, text: string): Classification;
}
