import { SetMetadata } from '@nestjs/common';
import { Capability } from '../lib/enums/user.enums';

export const CAPABILITIES_KEY = 'capabilities';

/** Every listed capability must be held by the caller's role. */
export const RequireCapability = (...capabilities: Capability[]) => SetMetadata(CAPABILITIES_KEY, capabilities);
