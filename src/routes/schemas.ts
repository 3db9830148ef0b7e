export interface UserBody {
  username?: string;
  email: string;
  first_name: string;
  last_name: string;
  password?: string;
}

export interface TenantBody {
  name: string;
  domain: string;
}

export const userBodySchema = {
  type: 'object',
  required: ['email', 'first_name', 'last_name'],
  properties: {
    username: { type: 'string', minLength: 1, maxLength: 255 },
    email: { type: 'string', format: 'email', maxLength: 320 },
    first_name: { type: 'string', minLength: 1, maxLength: 255 },
    last_name: { type: 'string', minLength: 1, maxLength: 255 },
    password: { type: 'string', minLength: 8, maxLength: 255 },
  },
} as const;

export const tenantBodySchema = {
  type: 'object',
  required: ['name', 'domain'],
  properties: {
    name: { type: 'string', minLength: 1, maxLength: 255 },
    domain: { type: 'string', minLength: 3, maxLength: 255, pattern: '^[a-zA-Z0-9.-]+\\.[a-zA-Z]{2,}$' },
  },
} as const;
