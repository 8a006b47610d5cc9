import { useCallback, useEffect, useMemo, useState } from 'react';
import { buildConnections, getConnectedFriends } from '@lib/compatibility';
import { applyFilterSort } from '@lib/filterSort';
import { friendFromRequest } from '@lib/schemas';
import type { SessionCache } from '@lib/sessionCache';
import type { ConnectionEdge, FriendProfile, PendingRequest, SortMode } from '@lib/types';

type UseConnectionsResult = {
  friends: FriendProfile[];
  requests: PendingRequest[];
  query: string;
  setQuery: (q: string) => void;
  sortMode: SortMode;
  setSortMode: (mode: SortMode) => void;
  visible: FriendProfile[];
  edges: ConnectionEdge[];
  connectedTo: (friend: FriendProfile) => FriendProfile[];
  acceptRequest: (id: number) => FriendProfile | null;
  declineRequest: (id: number) => void;
};

export function useConnections(
  initialFriends: readonly FriendProfile[],
  initialRequests: readonly PendingRequest[] = [],
  cache?: SessionCache,
): UseConnectionsResult {
  // a list kept from earlier in the session wins over the initial one
  const [friends, setFriends] = useState<FriendProfile[]>(() => [...(cache?.friends ?? initialFriends)]);
  const [requests, setRequests] = useState<PendingRequest[]>(() => [...initialRequests]);
  const [query, setQuery] = useState('');
  const [sortMode, setSortMode] = useState<SortMode>('all');

  useEffect(() => {
    if (cache) cache.friends = friends;
  }, [cache, friends]);

  const visible = useMemo(() => applyFilterSort(friends, query, sortMode), [friends, query, sortMode]);
  const edges = useMemo(() => buildConnections(friends), [friends]);

  const connectedTo = useCallback(
    (friend: FriendProfile) => getConnectedFriends(friend, edges, friends),
    [edges, friends],
  );

  const acceptRequest = useCallback(
    (id: number) => {
      const req = requests.find((r) => r.id === id);
      if (!req) return null;
      setRequests((prev) => prev.filter((r) => r.id !== id));
      // already a friend: the request is spent, nothing is added
      if (friends.some((f) => f.id === id)) return null;
      const friend = friendFromRequest(req);
      setFriends((prev) => (prev.some((f) => f.id === id) ? prev : [...prev, friend]));
      return friend;
    },
    [requests, friends],
  );

  const declineRequest = useCallback((id: number) => {
    setRequests((prev) => prev.filter((r) => r.id !== id));
  }, []);

  return { friends, requests, query, setQuery, sortMode, setSortMode, visible, edges, connectedTo, acceptRequest, declineRequest };
}
