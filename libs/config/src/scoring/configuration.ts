import { registerAs } from '@nestjs/config';
import { env } from 'node:process';

export default registerAs('scoring', () => ({
  rawMin: parseFloat(env.SCORE_RAW_MIN || '0'),
  rawMax: parseFloat(env.SCORE_RAW_MAX || '100'),
}));
