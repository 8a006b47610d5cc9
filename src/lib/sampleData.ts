// Demo connections shown before the backend exposes a friends endpoint.
import sample from '../data/sampleFriends.json';
import { decodeFriendProfile, PendingRequestSchema } from './schemas';
import type { FriendProfile, PendingRequest } from './types';

export function loadSampleFriends(): FriendProfile[] {
  return sample.friends.map((raw) => decodeFriendProfile(raw));
}

export function loadSampleRequests(): PendingRequest[] {
  return sample.requests.map((raw) => PendingRequestSchema.parse(raw));
}
