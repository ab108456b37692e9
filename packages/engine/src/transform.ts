import { Matrix4, Vector3 } from "three";
import type { Matrix4Elements, Vec3Tuple } from "@pbrtkit/ir";
import { ParseError } from "@pbrtkit/parser";

const DEG2RAD = Math.PI / 180;

function vec(v: Vec3Tuple): Vector3 {
  return new Vector3(v[0], v[1], v[2]);
}

export function translation(delta: Vec3Tuple): Matrix4 {
  return new Matrix4().makeTranslation(delta[0], delta[1], delta[2]);
}

export function scaling(scale: Vec3Tuple): Matrix4 {
  return new Matrix4().makeScale(scale[0], scale[1], scale[2]);
}

/** Rotation by `angle` degrees about `axis` (normalized here). */
export function rotation(angle: number, axis: Vec3Tuple): Matrix4 {
  const a = vec(axis);
  if (a.lengthSq() === 0) {
    throw new ParseError("InvalidTransform", "Rotate axis has zero length");
  }
  return new Matrix4().makeRotationAxis(a.normalize(), angle * DEG2RAD);
}

/**
 * Camera-from-world for a viewer at `eye` looking at `look`.
 *
 * Columns of the world-from-camera matrix are (right, up, dir, eye), with
 * `right = normalize(up × dir)`; the result is its inverse.
 */
export function lookAt(eye: Vec3Tuple, look: Vec3Tuple, up: Vec3Tuple): Matrix4 {
  const position = vec(eye);
  const dir = vec(look).sub(position);
  if (dir.lengthSq() === 0) {
    throw new ParseError("InvalidTransform", "LookAt eye and target coincide");
  }
  dir.normalize();

  const upDir = vec(up);
  if (upDir.lengthSq() === 0) {
    throw new ParseError("InvalidTransform", "LookAt up vector has zero length");
  }
  const right = new Vector3().crossVectors(upDir.normalize(), dir);
  if (right.lengthSq() === 0) {
    throw new ParseError("InvalidTransform", "LookAt up vector is parallel to the view direction");
  }
  right.normalize();
  const newUp = new Vector3().crossVectors(dir, right);

  const worldFromCamera = new Matrix4().makeBasis(right, newUp, dir).setPosition(position);
  return worldFromCamera.invert();
}

/** Matrix from 16 column-major values. */
export function fromElements(elements: Matrix4Elements): Matrix4 {
  if (elements.length !== 16) {
    throw new ParseError("InvalidTransform", `Expected 16 matrix values, got ${elements.length}`);
  }
  return new Matrix4().fromArray(elements);
}

export function toElements(m: Matrix4): Matrix4Elements {
  return [...m.elements];
}

/** Inverse of `m`; singular matrices are rejected. */
export function inverseOf(m: Matrix4): Matrix4 {
  if (m.determinant() === 0) {
    throw new ParseError("InvalidTransform", "Matrix is not invertible");
  }
  return m.clone().invert();
}
