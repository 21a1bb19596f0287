// Working-table column names. The working table only ever holds these,
// so they cannot collide with caller columns.
export const SET = '__set';
export const FEATURE = '__feature';
export const N = '__n';
export const ALPHA = '__alpha';
export const Y_WI = '__y_wi';
export const Y_W = '__y_w';
export const N_I = '__n_i';

// Output columns
export const LOG_ODDS = 'log_odds';
export const LOG_ODDS_WEIGHTED = 'log_odds_weighted';
