/**
 * Vector/rotation backend on three.js math classes.
 *
 * three stores matrices column-major in plain double arrays, so values are
 * converted at the boundary only; no precision is lost. three has no
 * physics-convention spherical constructor (its Spherical is y-up), so
 * `fromSpherical` builds the Vector3 from the same expression as the
 * self-contained backend, which keeps generated positions identical.
 */
import { Euler, Matrix3, Matrix4, Vector3 } from "three";

import type { Mat3, Vec3 } from "../types.js";
import type { VectorBackend } from "./types.js";
import { DomainError } from "../errors.js";
import { EPS_VECTOR_NORM } from "../constants.js";
import { requireFinite } from "../validate.js";

const toVector3 = (v: Vec3): Vector3 => new Vector3(v[0], v[1], v[2]);

const fromVector3 = (v: Vector3): Vec3 => [v.x, v.y, v.z];

const toMatrix3 = (m: Mat3): Matrix3 =>
  new Matrix3().set(
    m[0][0], m[0][1], m[0][2],
    m[1][0], m[1][1], m[1][2],
    m[2][0], m[2][1], m[2][2]
  );

const fromMatrix3 = (m: Matrix3): Mat3 => {
  const e = m.elements;
  return [
    [e[0], e[3], e[6]],
    [e[1], e[4], e[7]],
    [e[2], e[5], e[8]]
  ];
};

const fromMatrix4 = (m: Matrix4): Mat3 => fromMatrix3(new Matrix3().setFromMatrix4(m));

function normalizeVector3(fn: string, v: Vector3): Vector3 {
  const n = v.length();
  if (!(n > EPS_VECTOR_NORM)) {
    throw new DomainError(fn, [`cannot normalize a vector of length ${n}`]);
  }
  return v.normalize();
}

export const threeVectors: VectorBackend = {
  implementation: "library",

  add: (a, b) => fromVector3(toVector3(a).add(toVector3(b))),

  subtract: (a, b) => fromVector3(toVector3(a).sub(toVector3(b))),

  scale: (v, s) => fromVector3(toVector3(v).multiplyScalar(s)),

  dot: (a, b) => toVector3(a).dot(toVector3(b)),

  cross: (a, b) => fromVector3(new Vector3().crossVectors(toVector3(a), toVector3(b))),

  length: (v) => toVector3(v).length(),

  normalize: (v) => fromVector3(normalizeVector3("normalize", toVector3(v))),

  fromSpherical(r, theta, phi) {
    requireFinite("fromSpherical", { r, theta, phi });
    const sinTheta = Math.sin(theta);
    return fromVector3(
      new Vector3(r * sinTheta * Math.cos(phi), r * sinTheta * Math.sin(phi), r * Math.cos(theta))
    );
  },

  rotationX(angle) {
    requireFinite("rotationX", { angle });
    return fromMatrix4(new Matrix4().makeRotationX(angle));
  },

  rotationY(angle) {
    requireFinite("rotationY", { angle });
    return fromMatrix4(new Matrix4().makeRotationY(angle));
  },

  rotationZ(angle) {
    requireFinite("rotationZ", { angle });
    return fromMatrix4(new Matrix4().makeRotationZ(angle));
  },

  rotationAxisAngle(axis, angle) {
    requireFinite("rotationAxisAngle", { angle });
    const unit = normalizeVector3("normalize", toVector3(axis));
    return fromMatrix4(new Matrix4().makeRotationAxis(unit, angle));
  },

  rotationEuler(roll, pitch, yaw) {
    requireFinite("rotationEuler", { roll, pitch, yaw });
    // three's "ZYX" order builds Rz·Ry·Rx
    return fromMatrix4(new Matrix4().makeRotationFromEuler(new Euler(roll, pitch, yaw, "ZYX")));
  },

  multiplyMatrices: (a, b) => fromMatrix3(new Matrix3().multiplyMatrices(toMatrix3(a), toMatrix3(b))),

  applyMatrix: (m, v) => fromVector3(toVector3(v).applyMatrix3(toMatrix3(m)))
};
