/**
 * Why an incoming price did not produce an event
 */
export type DiscardReason =
    | 'stale_cycle'
    | 'zero_base_price'
    | 'below_threshold';
