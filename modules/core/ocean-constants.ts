/**
 * Fixed constants for ADCP geometry and the seawater equation of state.
 * TEOS-10 values (IOC, SCOR and IAPSO, 2010) where applicable.
 */

export const OCEAN_CONSTANTS = {
  // Nominal beam angle from the instrument axis (degrees), Janus configuration
  BEAM_ANGLE_DEG: 20,

  // Standard Ocean Reference Salinity (g/kg)
  SSO: 35.16504,

  // dbar -> Pa
  DBAR_TO_PA: 10_000,

  // Gravity as a function of latitude: g = G0 (1 + (G1 + G2 sin²φ) sin²φ)
  GRAVITY_G0: 9.780327,
  GRAVITY_G1: 5.2792e-3,
  GRAVITY_G2: 2.32e-5,

  // Vertical gradient of gravity, relative to g (m^-1)
  GRAVITY_GAMMA: 2.26e-7,

  DEG_TO_RAD: Math.PI / 180,
  RAD_TO_DEG: 180 / Math.PI,
} as const;

/**
 * Coefficients of the streamlined 48-term density expression that survive at
 * SA = SSO and CT = 0 °C.
 */
export const SPECIFIC_VOLUME_SSO_0 = {
  v01: 9.998420897506056e2,
  v05: -6.698001071123802,
  v08: -3.98882237896849e-2,
  v12: -2.233269627352527e-2,
  v15: -1.806789763745328e-4,
  v17: -3.087032500374211e-7,
  v20: 1.55093272922008e-10,
  v21: 1.0,
  v26: -7.521448093615448e-3,
  v31: -3.303308871386421e-5,
  v36: 5.41932655114874e-6,
  v37: -2.742185394906099e-5,
  v41: -1.105097577149576e-7,
  v43: -1.11901159287511e-10,
  v47: -1.200507748551599e-15,
} as const;
