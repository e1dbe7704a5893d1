import { TransformFnParams } from 'class-transformer';
import { blankToUndefined } from '../query';

export const trimToUndefined = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? blankToUndefined(value) : value;

export const normalizeEmail = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? value.toLowerCase().trim() : value;
