// src/api/profile/ProfileApi.ts

import { BaseApi } from '../BaseApi';
import type { CallOptions } from '../types';
import {
  AssignProfileRequestSchema,
  AssignProfileResponseSchema,
  ClearProfileRequestSchema,
  ClearProfileResponseSchema,
  DefineProfileResponseSchema,
  ProfileSchema,
  type AssignProfileResponse,
  type ClearProfileResponse,
  type DefineProfileResponse,
  type Profile,
} from './types';

export class ProfileApi extends BaseApi {
  /**
   * Define a profile with DEP. The returned UUID is what gets assigned to
   * devices.
   */
  async defineProfile(
    name: string,
    profile: Profile,
    opts?: CallOptions
  ): Promise<DefineProfileResponse> {
    const body = this.buildBody('defineProfile', ProfileSchema, profile);
    return this.call('defineProfile', name, DefineProfileResponseSchema, body, opts);
  }

  async getProfile(name: string, profileUuid: string, opts?: CallOptions): Promise<Profile> {
    return this.call('getProfile', name, ProfileSchema, undefined, {
      ...opts,
      query: { profile_uuid: profileUuid },
    });
  }

  /**
   * Assign a profile to serial numbers. A 2xx response is a success even
   * when some serials report a failure status; inspect `devices`.
   */
  async assignProfile(
    name: string,
    profileUuid: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<AssignProfileResponse> {
    const body = this.buildBody('assignProfile', AssignProfileRequestSchema, {
      profile_uuid: profileUuid,
      devices: serials,
    });
    return this.call('assignProfile', name, AssignProfileResponseSchema, body, opts);
  }

  /**
   * Unassign whatever profile the serials have. DEP documents a
   * `profile_uuid` field here but ignores it, so it is not sent.
   */
  async removeProfile(
    name: string,
    serials: string[],
    opts?: CallOptions
  ): Promise<ClearProfileResponse> {
    const body = this.buildBody('removeProfile', ClearProfileRequestSchema, { devices: serials });
    return this.call('removeProfile', name, ClearProfileResponseSchema, body, opts);
  }
}
