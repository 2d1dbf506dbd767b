/**
 * Maps session errors onto JSON error responses.
 */

import { NextResponse } from "next/server";
import {
  InputNotFoundError,
  InvalidValueError,
  ParseError,
  RatingCountError,
  UnknownItemError,
  UnsupportedEventError,
} from "./errors";

export function errorResponse(err: unknown): NextResponse {
  if (err instanceof InputNotFoundError) {
    return NextResponse.json({ error: err.message }, { status: 404 });
  }
  if (err instanceof ParseError) {
    return NextResponse.json({ error: err.message }, { status: 422 });
  }
  if (
    err instanceof InvalidValueError ||
    err instanceof UnknownItemError ||
    err instanceof RatingCountError ||
    err instanceof UnsupportedEventError
  ) {
    return NextResponse.json({ error: err.message }, { status: 400 });
  }
  throw err;
}
