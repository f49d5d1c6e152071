import { readEmail, readString } from '../../http/validation/fieldReaders';
import { jsonPayload } from '../../http/validation/payloadValidator';

export interface LoginDto {
  email: string;
  password: string;
}

export const loginSchema = jsonPayload<LoginDto>('Login', (payload, issues) => ({
  email: readEmail(payload, 'email', issues),
  password: readString(payload, 'password', { maxLength: 128, trim: false }, issues),
}));
