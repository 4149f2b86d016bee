// ============================================================================
// @textprobe/cli — ONNX Runtime Invoker
// ============================================================================
//
// InferenceInvoker backed by onnxruntime-web (WASM backend, runs under Node).
// The session is created once per invoker and released by dispose().
// ============================================================================

import { readFile } from 'node:fs/promises';
import {
  type EngineInfo,
  type InferenceInvoker,
  type InputTensor,
  InferenceRuntimeError,
  ModelLoadError,
  type OutputTensor,
  type TensorDType,
  type TensorSignature,
  assertInputCompatible,
  errorMessage,
  logger,
} from '@textprobe/core';
import * as ort from 'onnxruntime-web';

const SUPPORTED_INPUT_TYPES: readonly TensorDType[] = ['float32', 'int32', 'int64'];

function isSupportedInputType(type: string): type is TensorDType {
  return SUPPORTED_INPUT_TYPES.some((supported) => supported === type);
}

/** Read the first model input's declared signature from session metadata. */
function readInputSignature(session: ort.InferenceSession, modelPath: string): TensorSignature {
  const name = session.inputNames[0];
  if (name === undefined) {
    throw new ModelLoadError(modelPath, 'model declares no inputs');
  }
  const meta = session.inputMetadata.find((m) => m.name === name);
  if (!meta || !meta.isTensor) {
    throw new ModelLoadError(modelPath, `input "${name}" is not a tensor`);
  }
  if (!isSupportedInputType(meta.type)) {
    throw new ModelLoadError(modelPath, `input "${name}" has unsupported type ${meta.type}`);
  }
  // Symbolic (string) and negative dimensions are dynamic.
  const shape = meta.shape.map((dim) => (typeof dim === 'number' && dim >= 0 ? dim : null));
  return { name, dtype: meta.type, shape };
}

function toFloat32(data: ort.Tensor.DataType): Float32Array {
  if (data instanceof Float32Array) return data;
  if (data instanceof BigInt64Array || data instanceof BigUint64Array) {
    return Float32Array.from(data, (v) => Number(v));
  }
  if (Array.isArray(data)) {
    throw new InferenceRuntimeError('model produced a string tensor; expected numeric scores');
  }
  return Float32Array.from(data);
}

export class OnnxInvoker implements InferenceInvoker {
  readonly input: TensorSignature;
  readonly engine: EngineInfo;

  private readonly session: ort.InferenceSession;
  private readonly outputName: string;

  constructor(session: ort.InferenceSession, modelPath: string) {
    this.session = session;
    this.input = readInputSignature(session, modelPath);

    const outputName = session.outputNames[0];
    if (outputName === undefined) {
      throw new ModelLoadError(modelPath, 'model declares no outputs');
    }
    this.outputName = outputName;
    this.engine = {
      name: 'ONNX Runtime Web',
      version: ort.env.versions.web ?? ort.env.versions.common,
    };
  }

  /**
   * Load a model file and open a session on it.
   *
   * @throws ModelLoadError when the file cannot be read or the engine rejects it
   */
  static async create(modelPath: string): Promise<OnnxInvoker> {
    const t = logger.timer(`load model ${modelPath}`);

    let bytes: Uint8Array;
    try {
      bytes = await readFile(modelPath);
    } catch (err) {
      throw new ModelLoadError(modelPath, errorMessage(err), { cause: err });
    }

    ort.env.wasm.numThreads = 1;
    let session: ort.InferenceSession;
    try {
      session = await ort.InferenceSession.create(bytes, { executionProviders: ['wasm'] });
    } catch (err) {
      throw new ModelLoadError(modelPath, errorMessage(err), { cause: err });
    }

    const invoker = new OnnxInvoker(session, modelPath);
    t.endWith({ input: invoker.input.name, dtype: invoker.input.dtype });
    return invoker;
  }

  async run(input: InputTensor): Promise<OutputTensor> {
    assertInputCompatible(this.input, input);

    const dims = [...input.shape];
    const tensor =
      this.input.dtype === 'int64'
        ? new ort.Tensor('int64', BigInt64Array.from(input.data, (v) => BigInt(v)), dims)
        : input.data instanceof Float32Array
          ? new ort.Tensor('float32', input.data, dims)
          : new ort.Tensor('int32', input.data, dims);

    let results: ort.InferenceSession.ReturnType;
    try {
      results = await this.session.run({ [this.input.name]: tensor });
    } catch (err) {
      throw new InferenceRuntimeError(`ONNX Runtime failed: ${errorMessage(err)}`, { cause: err });
    }

    const output = results[this.outputName];
    if (!output) {
      throw new InferenceRuntimeError(`model returned no "${this.outputName}" output`);
    }
    return { data: toFloat32(output.data), shape: [...output.dims] };
  }

  async dispose(): Promise<void> {
    await this.session.release();
  }
}
