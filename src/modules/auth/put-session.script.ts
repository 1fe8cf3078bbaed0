/**
 * Inserts one session into a user's hash and trims the hash to the session bound
 * in a single step, so concurrent logins for the same user cannot overshoot it.
 *
 * KEYS[1]  user session hash
 * ARGV[1]  max sessions per user
 * ARGV[2]  session id (numeric, grows with issuance)
 * ARGV[3]  serialized principal
 * ARGV[4]  hash TTL in seconds
 *
 * Returns the evicted session ids, oldest first.
 */
export const PUT_SESSION_SCRIPT = `
local key = KEYS[1]
local max_sessions = tonumber(ARGV[1])
local session_id = ARGV[2]
local principal = ARGV[3]
local ttl_seconds = tonumber(ARGV[4])

local evicted = {}

if redis.call('HEXISTS', key, session_id) == 0 then
  local session_ids = redis.call('HKEYS', key)

  table.sort(session_ids, function(left, right)
    local left_number, right_number = tonumber(left), tonumber(right)
    if left_number and right_number then
      return left_number < right_number
    end
    return left < right
  end)

  local overflow = #session_ids - max_sessions + 1
  for index = 1, overflow do
    redis.call('HDEL', key, session_ids[index])
    evicted[#evicted + 1] = session_ids[index]
  end
end

redis.call('HSET', key, session_id, principal)
redis.call('EXPIRE', key, ttl_seconds)

return evicted
`;
